/** Task-relative locations of review artifacts */
export const REVIEW_PATHS = {
  findings: (lens: string): string => `review/findings/${lens}.md`,
  lensInput: (lens: string): string => `review/findings/.inputs/context_pack.${lens}.md`,
  lensLog: (lens: string): string => `review/findings/.logs/${lens}.log`,
  merged: 'review/review_merged_findings.json',
  mergeLog: 'review/review_merge_log.json',
  queue: 'review/review_fix_queue.json',
  fix: (queueId: string): string => `review/fixes/${queueId}.md`,
  securityRound: (round: number): string => `review/security_fix_rounds/round-${String(round)}`,
  securityGate: 'review/security_gate_result.json',
  summary: 'review/summary.md',
} as const
