import { describe, it, expect } from "vitest";
import { AppError, BadRequestError, ConfigError, errorMessage, isAppError, toAppError } from "./errors.js";

describe("AppError", () => {
  it("serializes code, message and details", () => {
    const err = new ConfigError([{ field: "ocrDpi", message: "must be at least 1" }]);

    expect(err).toBeInstanceOf(AppError);
    expect(err.name).toBe("ConfigError");
    expect(err.toJSON()).toEqual({
      code: "CONFIG_ERROR",
      message: "Invalid metadata options: ocrDpi: must be at least 1",
      details: [{ field: "ocrDpi", message: "must be at least 1" }],
    });
  });

  it("omits details when there are none", () => {
    expect(new BadRequestError().toJSON()).toEqual({ code: "BAD_REQUEST", message: "Bad request" });
  });
});

describe("toAppError", () => {
  it("keeps AppErrors and wraps everything else as INTERNAL_ERROR", () => {
    const known = new BadRequestError("nope");
    expect(toAppError(known)).toBe(known);

    const wrapped = toAppError(new Error("disk on fire"));
    expect(isAppError(wrapped)).toBe(true);
    expect(wrapped.code).toBe("INTERNAL_ERROR");
    expect(wrapped.statusCode).toBe(500);
    expect(wrapped.message).toBe("disk on fire");

    expect(toAppError("string").message).toBe("An unexpected error occurred");
  });
});

describe("errorMessage", () => {
  it("reads Error messages and stringifies other values", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage(42)).toBe("42");
  });
});
