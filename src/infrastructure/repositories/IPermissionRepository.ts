export interface IPermissionRepository {
  /**
   * Distinct `resource:action` strings granted through the principal's
   * active roles. Empty for an unknown principal.
   */
  findPermissionClosure(
    principalId: string,
    signal?: AbortSignal,
  ): Promise<string[]>;
}
