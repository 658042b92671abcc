import { describe, it, expect } from "vitest";
import { GaxiosError, type GaxiosResponse } from "gaxios";
import { Metadata, status } from "@grpc/grpc-js";
import { Code, compact, withHttpStatus, httpErrorCoder } from "errcode";
import { grpcErrorCoder } from "errcode-grpc";
import { gaxiosErrorCode, googleApiErrorCode, googleApiErrorCoder } from "./googleapi-error";

const url = "https://storage.example.test/storage/v1/b/uploads/o/report.csv";

function gaxiosError(httpStatus: number, statusText: string): GaxiosError {
  const response: GaxiosResponse = {
    config: { url },
    data: { error: { code: httpStatus, message: statusText } },
    status: httpStatus,
    statusText,
    headers: {},
    request: { responseURL: url },
  };
  return new GaxiosError(statusText, { url }, response);
}

describe("gaxiosErrorCode", () => {
  it("returns OK for null", () => {
    expect(gaxiosErrorCode(null)).toBe(Code.OK);
  });

  it("translates the response status", () => {
    expect(gaxiosErrorCode(gaxiosError(404, "Not Found"))).toBe(Code.NotFound);
    expect(gaxiosErrorCode(gaxiosError(429, "Too Many Requests"))).toBe(Code.ResourceExhausted);
  });

  it("returns Unknown when no response was received", () => {
    const error = new GaxiosError("socket hang up", { url });
    expect(gaxiosErrorCode(error)).toBe(Code.Unknown);
  });

  it("returns Unknown for other errors", () => {
    expect(gaxiosErrorCode(new Error("x"))).toBe(Code.Unknown);
  });
});

describe("googleApiErrorCoder", () => {
  it("returns OK for null", () => {
    expect(googleApiErrorCode(undefined)).toBe(Code.OK);
  });

  it("classifies REST client errors", () => {
    const error = new Error("download failed", { cause: gaxiosError(403, "Forbidden") });
    expect(googleApiErrorCode(error)).toBe(Code.PermissionDenied);
  });

  it("classifies gRPC client errors", () => {
    const error = Object.assign(new Error("5 NOT_FOUND: topic"), {
      code: status.NOT_FOUND,
      details: "topic",
      metadata: new Metadata(),
    });
    expect(googleApiErrorCode(error)).toBe(Code.NotFound);
  });

  it("prefers a gRPC status over an HTTP status", () => {
    const cause = withHttpStatus(500, new Error("quota"));
    const error = Object.assign(new Error("8 RESOURCE_EXHAUSTED: quota", { cause }), {
      code: status.RESOURCE_EXHAUSTED,
      metadata: new Metadata(),
    });
    expect(googleApiErrorCode(error)).toBe(Code.ResourceExhausted);
  });

  it("prefers an attached HTTP status over the gaxios response", () => {
    const error = withHttpStatus(503, gaxiosError(500, "Internal Server Error"));
    expect(googleApiErrorCode(error)).toBe(Code.Unavailable);
  });

  it("returns Unknown for unrelated errors", () => {
    expect(googleApiErrorCode(new Error("x"))).toBe(Code.Unknown);
  });

  it("flattens into the shared gRPC and HTTP coders", () => {
    const coder = compact(grpcErrorCoder(), googleApiErrorCoder(), httpErrorCoder());
    expect(coder.size).toBe(3);
    expect(coder.coders[0]).toBe(grpcErrorCoder());
    expect(coder.coders[1]).toBe(httpErrorCoder());
  });
});
