import { LoginHistoryEntry } from "../../domain/entities/LoginHistoryEntry";

export interface ILoginHistoryRepository {
  /** Newest first */
  findByPrincipal(
    principalId: string,
    limit?: number,
    signal?: AbortSignal,
  ): Promise<LoginHistoryEntry[]>;
}
