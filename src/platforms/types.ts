import type { AliasTable } from '../models/schema'

export type StructuredField = 'name' | 'handle' | 'bio' | 'followers' | 'following'

export interface VisibleTextSelectors {
  /** One container per post or reply */
  post: string
  /** Text body inside a post container */
  postText: string
  /** Anchor inside a post container whose href is the author's profile path */
  authorLink: string
  bio: string[]
}

export interface PlatformDefinition {
  name: string
  /** Hosts (and their subdomains) that belong to the platform */
  domains: string[]
  /** Platform-link field carried by every record and preferred as join key */
  linkField: string
  /** Ordered selector candidates per profile field */
  fieldSelectors: Record<StructuredField, string[]>
  visibleText: VisibleTextSelectors
  /** Same-site paths that never count as content links */
  excludedLinkPaths: RegExp[]
  /** Merged-record fields re-scanned for emails and phones */
  entityTextFields: string[]
  /** A structured record is a total failure when all of these are empty */
  totalFailureFields: StructuredField[]
  aliasTable: AliasTable
  overlayCloseSelectors?: string[]
}
