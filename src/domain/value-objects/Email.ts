import { ValidationError } from "../../shared/errors";

class Email {
  private _value: string;

  constructor(value: string) {
    const normalized = Email.normalize(value);
    if (!this.isValidEmail(normalized)) {
      throw new ValidationError("Invalid email format");
    }
    this._value = normalized;
  }

  /**
   * Lookup form of an address: trimmed and lowercased.
   */
  static normalize(value: string): string {
    return value.trim().toLowerCase();
  }

  private isValidEmail(email: string): boolean {
    const regex = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
    return regex.test(email);
  }

  get value(): string {
    return this._value;
  }

  equals(other: Email): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }
}

export { Email };
