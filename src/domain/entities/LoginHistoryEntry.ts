export interface LoginHistoryEntry {
  id: string;
  principalId: string;
  succeeded: boolean;
  ipAddress: string;
  userAgent: string;
  failureReason?: string;
  occurredAt: Date;
}
