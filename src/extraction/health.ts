import type { ExtractionRecord } from '../models/record'
import { isErrorRecord } from '../models/record'
import type { HealthReport, HealthStatus } from './types'

export function buildHealthReport(
  strategy: string,
  records: ExtractionRecord[],
): HealthReport {
  const failed = records.filter(isErrorRecord).length
  const total = records.length
  const succeeded = total - failed
  const status = computeStatus(total, failed)

  return {
    strategy,
    status,
    total,
    succeeded,
    failed,
    message: buildMessage(strategy, status, succeeded, total),
  }
}

export function computeStatus(total: number, failed: number): HealthStatus {
  if (total === 0 || failed >= total) return 'broken'
  if (failed === 0) return 'healthy'
  return 'degraded'
}

function buildMessage(
  strategy: string,
  status: HealthStatus,
  succeeded: number,
  total: number,
): string {
  if (status === 'healthy') {
    return `${strategy} extraction healthy: ${succeeded}/${total} pages`
  }

  if (status === 'degraded') {
    return `${strategy} extraction degraded: ${succeeded}/${total} pages without errors`
  }

  return `${strategy} extraction broken: no page extracted cleanly`
}
