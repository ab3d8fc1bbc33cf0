/**
 * Unit Tests for Email Value Object
 */

import { Email } from "../../src/domain/value-objects/Email";
import { ValidationError } from "../../src/shared/errors";

describe("Email Value Object", () => {
  it("should accept common address formats", () => {
    expect(new Email("user@example.com").value).toBe("user@example.com");
    expect(new Email("first.last+tag@mail.example.com").value).toBe(
      "first.last+tag@mail.example.com",
    );
  });

  it("should trim and lowercase the address", () => {
    expect(new Email("  Alice@Example.COM ").value).toBe("alice@example.com");
    expect(Email.normalize(" Bob@Example.com")).toBe("bob@example.com");
  });

  it("should reject malformed addresses", () => {
    expect(() => new Email("not-an-email")).toThrow(ValidationError);
    expect(() => new Email("user@localhost")).toThrow("Invalid email format");
    expect(() => new Email("a b@example.com")).toThrow(ValidationError);
  });

  it("should compare by normalized value", () => {
    expect(new Email("USER@example.com").equals(new Email("user@EXAMPLE.com"))).toBe(true);
    expect(new Email("a@example.com").equals(new Email("b@example.com"))).toBe(false);
    expect(new Email("a@example.com").toString()).toBe("a@example.com");
  });
});
