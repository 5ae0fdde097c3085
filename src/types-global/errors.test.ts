import { describe, expect, it } from "vitest";
import {
  BaseErrorCode,
  EntrezError,
  isEntrezError,
} from "./errors.js";

describe("EntrezError", () => {
  it("carries code, details and cause", () => {
    const cause = new Error("socket hang up");
    const error = new EntrezError(
      BaseErrorCode.NCBI_HTTP_ERROR,
      "NCBI esearch request failed with HTTP 500",
      { status: 500, body: "Internal Server Error" },
      { cause },
    );

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("EntrezError");
    expect(error.code).toBe(BaseErrorCode.NCBI_HTTP_ERROR);
    expect(error.details).toEqual({ status: 500, body: "Internal Server Error" });
    expect(error.cause).toBe(cause);
  });
});

describe("isEntrezError", () => {
  it("distinguishes EntrezError from other errors", () => {
    expect(isEntrezError(new EntrezError(BaseErrorCode.INTERNAL_ERROR, "x"))).toBe(
      true,
    );
    expect(isEntrezError(new Error("x"))).toBe(false);
    expect(isEntrezError("x")).toBe(false);
  });
});
