import { AxiosError } from "axios";
import { describe, expect, it } from "vitest";
import { BaseErrorCode, EntrezError } from "../../types-global/errors.js";
import { ErrorHandler } from "./errorHandler.js";

describe("ErrorHandler.handleError", () => {
  it("returns an EntrezError unchanged", () => {
    const original = new EntrezError(BaseErrorCode.NCBI_HTTP_ERROR, "HTTP 500", {
      status: 500,
    });

    expect(ErrorHandler.handleError(original, { operation: "test" })).toBe(
      original,
    );
  });

  it("wraps a plain error as an internal error with its cause", () => {
    const original = new Error("boom");

    const handled = ErrorHandler.handleError(original, { operation: "parse" });

    expect(handled.code).toBe(BaseErrorCode.INTERNAL_ERROR);
    expect(handled.message).toBe("Error in parse: boom");
    expect(handled.cause).toBe(original);
  });

  it("uses the requested fallback code", () => {
    const handled = ErrorHandler.handleError("not an error", {
      operation: "parse",
      errorCode: BaseErrorCode.VALIDATION_ERROR,
    });

    expect(handled.code).toBe(BaseErrorCode.VALIDATION_ERROR);
    expect(handled.message).toBe("Error in parse: not an error");
  });

  it("classifies an axios error without a response as unavailable", () => {
    const handled = ErrorHandler.handleError(
      new AxiosError("timeout of 10ms exceeded", "ECONNABORTED"),
      { operation: "request" },
    );

    expect(handled.code).toBe(BaseErrorCode.NCBI_SERVICE_UNAVAILABLE);
    expect(handled.details).toEqual({
      operation: "request",
      axiosCode: "ECONNABORTED",
    });
  });

  it("throws when asked to rethrow", () => {
    expect(() =>
      ErrorHandler.handleError(new Error("boom"), {
        operation: "parse",
        rethrow: true,
      }),
    ).toThrow("Error in parse: boom");
  });
});

describe("ErrorHandler.tryCatch", () => {
  it("returns the result of a successful operation", async () => {
    await expect(
      ErrorHandler.tryCatch(async () => 7, { operation: "count" }),
    ).resolves.toBe(7);
  });

  it("rethrows failures as EntrezError", async () => {
    await expect(
      ErrorHandler.tryCatch(
        async () => {
          throw new TypeError("bad input");
        },
        { operation: "count" },
      ),
    ).rejects.toMatchObject({
      name: "EntrezError",
      code: BaseErrorCode.INTERNAL_ERROR,
      message: "Error in count: bad input",
    });
  });

  it("is exported from the package entry point", async () => {
    const entry = await import("../../index.js");

    expect(entry.ErrorHandler).toBe(ErrorHandler);
    await expect(
      entry.ErrorHandler.tryCatch(
        async () => {
          throw new entry.EntrezError(
            entry.BaseErrorCode.NCBI_HTTP_ERROR,
            "NCBI esearch request failed with HTTP 500",
          );
        },
        { operation: "search" },
      ),
    ).rejects.toMatchObject({ code: BaseErrorCode.NCBI_HTTP_ERROR });
  });
});
