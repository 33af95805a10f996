/**
 * Unit tests for transport error translation
 *
 * Feeds hand-built error shapes (HttpError, objects carrying a nested response status); no network
 */

import { describe, it, expect } from "vitest";
import {
  AuthError,
  ConfigError,
  ConflictError,
  NotFoundError,
  TransportError,
  extractStatus,
  translateTransportError,
} from "@/errors";
import { HttpError } from "@/clients/http";

const EMAIL = "writer@test-project.iam.gserviceaccount.com";

function responseError(status: number, message: string): Error {
  return Object.assign(new Error(message), {
    code: status,
    response: { status },
  });
}

describe("extractStatus", () => {
  it("reads status from HttpError, nested responses and numeric codes", () => {
    const httpError = new HttpError({ status: 404, url: "https://example.test" });
    expect(extractStatus(httpError)).toBe(404);
    expect(extractStatus({ response: { status: 503 } })).toBe(503);
    expect(extractStatus({ code: "403" })).toBe(403);
    expect(extractStatus({ code: "ECONNRESET" })).toBeUndefined();
    expect(extractStatus("boom")).toBeUndefined();
  });
});

describe("translateTransportError", () => {
  it("passes taxonomy errors through", () => {
    const original = new ConfigError("bad");
    expect(translateTransportError(original, { operation: "read" })).toBe(original);
  });

  it("maps 401 and OAuth failures to AuthError", () => {
    expect(
      translateTransportError(responseError(401, "Login Required"), { operation: "read" }),
    ).toBeInstanceOf(AuthError);
    expect(
      translateTransportError(new Error("invalid_grant: account not found"), {
        operation: "authorize",
      }),
    ).toBeInstanceOf(AuthError);
  });

  it("maps a disabled API to AuthError", () => {
    const error = translateTransportError(
      responseError(403, "Google Sheets API has not been used in project 123 before or it is disabled."),
      { operation: "read", clientEmail: EMAIL },
    );
    expect(error).toBeInstanceOf(AuthError);
  });

  it("maps other 403s to NotFoundError with sharing guidance", () => {
    const error = translateTransportError(
      responseError(403, "The caller does not have permission"),
      { operation: "open", spreadsheet: "KEY", clientEmail: EMAIL },
    );
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.message).toBe(
      `Access denied to spreadsheet KEY. Make sure it exists and is shared with ${EMAIL}.`,
    );
    expect(error.details).toMatchObject({ status: 403, operation: "open", spreadsheet: "KEY" });
  });

  it("gives public-access guidance without a service account", () => {
    const error = translateTransportError(
      new HttpError({ status: 404, url: "https://example.test" }),
      { operation: "read", spreadsheet: "KEY", worksheet: "gid 0" },
    );
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.message).toBe(
      'Could not find worksheet gid 0 of spreadsheet KEY. Make sure it exists and is shared as "Anyone with the link can view".',
    );
  });

  it("maps 409 and duplicate titles to ConflictError", () => {
    expect(
      translateTransportError(responseError(409, "Conflict"), { operation: "create" }),
    ).toBeInstanceOf(ConflictError);
    expect(
      translateTransportError(
        responseError(400, 'Invalid requests[0].addSheet: A sheet with the name "Q1" already exists.'),
        { operation: "create" },
      ),
    ).toBeInstanceOf(ConflictError);
  });

  it("maps an unparseable range to NotFoundError", () => {
    expect(
      translateTransportError(responseError(400, "Unable to parse range: 'Gone'"), {
        operation: "read",
      }),
    ).toBeInstanceOf(NotFoundError);
  });

  it("maps everything else to TransportError and keeps the cause", () => {
    const raw = responseError(500, "Internal error encountered.");
    const error = translateTransportError(raw, { operation: "update" });
    expect(error).toBeInstanceOf(TransportError);
    expect(error.message).toBe(
      "Google Sheets request failed during update: Internal error encountered.",
    );
    expect(error.cause).toBe(raw);
  });

  it("accepts non-Error values", () => {
    const error = translateTransportError("socket closed", { operation: "read" });
    expect(error).toBeInstanceOf(TransportError);
    expect(error.message).toBe("Google Sheets request failed during read: socket closed");
  });
});
