import type { PlatformDefinition } from './types'

export const TWITTER_PLATFORM: PlatformDefinition = {
  name: 'twitter',
  domains: ['x.com', 'twitter.com'],
  linkField: 'twitter_link',
  fieldSelectors: {
    name: [
      "div[data-testid='UserName'] span",
      "h2[role='heading'] span",
    ],
    handle: ["div[data-testid='UserName'] div span:has-text('@')"],
    bio: [
      "div[data-testid='UserDescription']",
      "div[data-testid='UserDescription'] span",
    ],
    followers: [
      "a[href$='/verified_followers'] span",
      "a[href$='/followers'] span",
    ],
    following: ["a[href$='/following'] span"],
  },
  visibleText: {
    post: "article[data-testid='tweet']",
    postText: "div[data-testid='tweetText']",
    authorLink: "div[data-testid='User-Name'] a[href^='/']",
    bio: ["div[data-testid='UserDescription']"],
  },
  excludedLinkPaths: [
    /^\/i\//,
    /\/analytics\/?$/,
    /^\/hashtag\//,
    /^\/search\/?$/,
    /^\/explore\/?/,
  ],
  entityTextFields: ['bio', 'main_tweet_text'],
  totalFailureFields: ['name', 'bio'],
  aliasTable: {
    url: ['twitter_link', 'source_url', 'url'],
    platform: ['platform'],
    'profile.username': ['handle', 'username'],
    'profile.full_name': ['name', 'full_name'],
    'profile.bio': ['bio'],
    'profile.followers_count': ['followers_num'],
    'profile.following_count': ['following_num'],
    'contact.emails': ['emails'],
    'contact.phone_numbers': ['phones', 'phone_numbers'],
    'contact.websites': ['external_links'],
    'contact.social_media_handles.twitter': ['handle'],
    'content.caption': ['main_tweet_text'],
    'content.author_name': ['primary_author'],
    'content.hashtags': ['hashtags'],
    'metadata.scraped_at': ['scraped_at'],
    'metadata.error': ['error'],
  },
}
