/**
 * Request body validation. Failures throw tsoa's ValidateError, which the
 * error handler turns into a 422 with per-field messages.
 */

import { ValidateError, type FieldErrors } from "@tsoa/runtime";
import type { ItineraryRequestBody, PlaceInput, SearchRequest } from "./requests.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalNumber(
  body: Record<string, unknown>,
  key: string,
  fields: FieldErrors,
  integer: boolean,
): number | undefined {
  const value = body[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value) || (integer && !Number.isInteger(value))) {
    fields[`body.${key}`] = { message: integer ? "must be an integer" : "must be a number", value };
    return undefined;
  }
  return value;
}

function searchFields(body: Record<string, unknown>, fields: FieldErrors): SearchRequest {
  const query = body["query"];
  if (typeof query !== "string") {
    fields["body.query"] = { message: "'query' is required", value: query };
  }

  const request: SearchRequest = { query: typeof query === "string" ? query : "" };
  const topK = optionalNumber(body, "topK", fields, true);
  if (topK !== undefined) request.topK = topK;
  const maxHops = optionalNumber(body, "maxHops", fields, true);
  if (maxHops !== undefined) request.maxHops = maxHops;
  const alpha = optionalNumber(body, "alpha", fields, false);
  if (alpha !== undefined) request.alpha = alpha;

  const kinds = body["relationshipKinds"];
  if (kinds !== undefined) {
    if (Array.isArray(kinds) && kinds.every((k): k is string => typeof k === "string")) {
      request.relationshipKinds = kinds;
    } else {
      fields["body.relationshipKinds"] = { message: "must be an array of strings", value: kinds };
    }
  }
  return request;
}

function parsePlace(value: unknown, fields: FieldErrors): PlaceInput | undefined {
  if (
    isRecord(value) &&
    typeof value["name"] === "string" &&
    typeof value["lat"] === "number" &&
    typeof value["lng"] === "number"
  ) {
    return { name: value["name"], lat: value["lat"], lng: value["lng"] };
  }
  fields["body.origin"] = { message: "must be { name, lat, lng }", value };
  return undefined;
}

export function parseSearchRequest(body: unknown): SearchRequest {
  const fields: FieldErrors = {};
  if (!isRecord(body)) {
    throw new ValidateError({ body: { message: "must be a JSON object" } }, "Validation failed");
  }
  const request = searchFields(body, fields);
  if (Object.keys(fields).length > 0) throw new ValidateError(fields, "Validation failed");
  return request;
}

export function parseItineraryRequest(body: unknown): ItineraryRequestBody {
  const fields: FieldErrors = {};
  if (!isRecord(body)) {
    throw new ValidateError({ body: { message: "must be a JSON object" } }, "Validation failed");
  }
  const request: ItineraryRequestBody = searchFields(body, fields);
  if (body["origin"] !== undefined) {
    const origin = parsePlace(body["origin"], fields);
    if (origin) request.origin = origin;
  }
  const maxContextChars = optionalNumber(body, "maxContextChars", fields, true);
  if (maxContextChars !== undefined) {
    if (maxContextChars < 0) {
      fields["body.maxContextChars"] = { message: "must not be negative", value: maxContextChars };
    } else {
      request.maxContextChars = maxContextChars;
    }
  }
  if (Object.keys(fields).length > 0) throw new ValidateError(fields, "Validation failed");
  return request;
}
