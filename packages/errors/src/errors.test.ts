import { describe, it, expect } from "vitest";
import { AppError } from "./app-error.js";
import {
  TransportError,
  MalformedRecordError,
  ConfigurationError,
  EmbeddingProviderError,
  IndexWriteError,
  errorMessage,
} from "./errors.js";

describe("AppError", () => {
  it("creates error with all properties", () => {
    const cause = new Error("root cause");
    const err = new AppError({
      message: "test error",
      statusCode: 500,
      code: "INTERNAL",
      isOperational: false,
      details: { foo: "bar" },
      cause,
    });

    expect(err.message).toBe("test error");
    expect(err.statusCode).toBe(500);
    expect(err.code).toBe("INTERNAL");
    expect(err.isOperational).toBe(false);
    expect(err.details).toEqual({ foo: "bar" });
    expect(err.cause).toBe(cause);
    expect(err.name).toBe("AppError");
    expect(err).toBeInstanceOf(Error);
  });

  it("defaults isOperational to true", () => {
    const err = new AppError({ message: "test", statusCode: 400, code: "BAD" });
    expect(err.isOperational).toBe(true);
  });

  it("isAppError detects AppError instances", () => {
    expect(AppError.isAppError(new MalformedRecordError())).toBe(true);
    expect(AppError.isAppError(new Error("plain"))).toBe(false);
    expect(AppError.isAppError(null)).toBe(false);
  });
});

describe("Error taxonomy", () => {
  describe("TransportError", () => {
    it("keeps an upstream 4xx status", () => {
      const err = new TransportError("Jira request failed", "jira", { status: 401 });
      expect(err.statusCode).toBe(401);
      expect(err.status).toBe(401);
      expect(err.code).toBe("TRANSPORT_ERROR");
      expect(err.service).toBe("jira");
      expect(err.details).toEqual({ service: "jira", status: 401 });
      expect(err.name).toBe("TransportError");
    });

    it("maps upstream 5xx and network failures to 502", () => {
      expect(new TransportError("boom", "teams", { status: 503 }).statusCode).toBe(502);
      expect(new TransportError("socket hang up", "teams").statusCode).toBe(502);
    });
  });

  it("MalformedRecordError has status 422", () => {
    const err = new MalformedRecordError("Record has no id", { details: { source: "jira" } });
    expect(err.statusCode).toBe(422);
    expect(err.code).toBe("MALFORMED_RECORD");
    expect(err.details).toEqual({ source: "jira" });
  });

  it("ConfigurationError lists every issue in its message", () => {
    const err = new ConfigurationError("Invalid configuration", [
      "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
      "COHERE_API_KEY is required",
    ]);
    expect(err.message).toBe(
      "Invalid configuration:\n  - CHUNK_OVERLAP must be smaller than CHUNK_SIZE\n  - COHERE_API_KEY is required",
    );
    expect(err.issues).toHaveLength(2);
    expect(err.isOperational).toBe(false);
  });

  it("ConfigurationError without issues keeps the plain message", () => {
    expect(new ConfigurationError("chunkSize must be positive").message).toBe(
      "chunkSize must be positive",
    );
  });

  it("EmbeddingProviderError records the provider", () => {
    const err = new EmbeddingProviderError("rate limited", "cohere");
    expect(err.provider).toBe("cohere");
    expect(err.statusCode).toBe(502);
    expect(err.code).toBe("EMBEDDING_PROVIDER_ERROR");
  });

  it("IndexWriteError is not operational", () => {
    const err = new IndexWriteError();
    expect(err.message).toBe("Vector index unavailable");
    expect(err.statusCode).toBe(503);
    expect(err.isOperational).toBe(false);
  });
});

describe("errorMessage", () => {
  it("reads Error messages and stringifies everything else", () => {
    expect(errorMessage(new Error("bad"))).toBe("bad");
    expect(errorMessage("plain")).toBe("plain");
    expect(errorMessage(42)).toBe("42");
  });
});
