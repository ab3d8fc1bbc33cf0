import * as crypto from "crypto";

export class SecurityUtils {
  /**
   * Generate a cryptographically secure random token, base64url encoded.
   */
  static generateSecureToken(byteLength: number = 32): string {
    return crypto.randomBytes(byteLength).toString("base64url");
  }

  /**
   * One-way digest used to store opaque token values at rest.
   */
  static hashToken(value: string): string {
    return crypto.createHash("sha256").update(value).digest("hex");
  }

  static generateId(): string {
    return crypto.randomUUID();
  }

  static extractTokenFromHeader(authHeader: string | undefined): string | null {
    if (!authHeader) {
      return null;
    }
    const [scheme, token] = authHeader.split(" ");
    if (scheme !== "Bearer" || !token) {
      return null;
    }
    return token;
  }
}
