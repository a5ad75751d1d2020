/**
 * Layered JSON config for retrieval parameters.
 *
 * `configs/retrieval/base.json` holds a full RetrievalConfig; named
 * profiles under `configs/retrieval/profiles/` are partial overrides that
 * deep-merge on top of it. Missing files fall back to built-in defaults.
 */

import { existsSync, readFileSync, readdirSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import {
  RELATIONSHIP_KINDS,
  isRelationshipKind,
  type RetrievalConfig,
  type RetrievalProfileInfo,
} from "@transit-vibes/types";
import { InvalidInputError } from "../errors/index.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RetrievalProfile extends RetrievalProfileInfo {
  /** Partial RetrievalConfig, validated after merging */
  overrides: Record<string, unknown>;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export function getDefaultRetrievalConfig(): RetrievalConfig {
  return {
    topK: 10,
    maxHops: 2,
    relationshipKinds: [...RELATIONSHIP_KINDS],
    alpha: 0.7,
    oversampleFactor: 3,
    maxContextChars: 2000,
    timeouts: {
      encoderMs: 2000,
      indexMs: 1000,
      graphMs: 1000,
      generatorMs: 20000,
    },
    retryBackoffMs: 100,
  };
}

// ---------------------------------------------------------------------------
// Deep merge
// ---------------------------------------------------------------------------

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Shallow copy of a typed object as a string-keyed record */
function asRecord(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value));
}

/** Leaf-level deep merge: source values override target values; arrays replace. */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const [key, srcVal] of Object.entries(source)) {
    const tgtVal = target[key];
    if (isPlainObject(srcVal) && isPlainObject(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else if (srcVal !== undefined) {
      result[key] = srcVal;
    }
  }
  return result;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function positiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function nonNegativeNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0;
}

/**
 * Check an untrusted object is a complete, in-range RetrievalConfig.
 * Throws InvalidInputError naming the first bad field.
 */
export function validateRetrievalConfig(raw: unknown): RetrievalConfig {
  if (!isPlainObject(raw)) throw new InvalidInputError("retrieval config must be an object");
  const { topK, maxHops, relationshipKinds, alpha, oversampleFactor, maxContextChars, timeouts, retryBackoffMs } = raw;

  if (!positiveInteger(topK)) throw new InvalidInputError("topK must be a positive integer");
  if (typeof maxHops !== "number" || !Number.isInteger(maxHops) || maxHops < 0) {
    throw new InvalidInputError("maxHops must be a non-negative integer");
  }
  if (!Array.isArray(relationshipKinds) || !relationshipKinds.every(isRelationshipKind)) {
    throw new InvalidInputError(`relationshipKinds must be a subset of ${RELATIONSHIP_KINDS.join(", ")}`);
  }
  if (typeof alpha !== "number" || !(alpha >= 0 && alpha <= 1)) {
    throw new InvalidInputError("alpha must be within [0, 1]");
  }
  if (typeof oversampleFactor !== "number" || !(oversampleFactor >= 1) || !Number.isFinite(oversampleFactor)) {
    throw new InvalidInputError("oversampleFactor must be a finite number >= 1");
  }
  if (typeof maxContextChars !== "number" || !Number.isInteger(maxContextChars) || maxContextChars < 0) {
    throw new InvalidInputError("maxContextChars must be a non-negative integer");
  }
  if (!nonNegativeNumber(retryBackoffMs)) {
    throw new InvalidInputError("retryBackoffMs must be a non-negative number");
  }
  if (!isPlainObject(timeouts)) throw new InvalidInputError("timeouts must be an object");
  const { encoderMs, indexMs, graphMs, generatorMs } = timeouts;
  if (!positiveInteger(encoderMs) || !positiveInteger(indexMs) || !positiveInteger(graphMs) || !positiveInteger(generatorMs)) {
    throw new InvalidInputError("timeouts must be positive integers (ms)");
  }

  return {
    topK,
    maxHops,
    relationshipKinds,
    alpha,
    oversampleFactor,
    maxContextChars,
    timeouts: { encoderMs, indexMs, graphMs, generatorMs },
    retryBackoffMs,
  };
}

// ---------------------------------------------------------------------------
// Config directory resolution
// ---------------------------------------------------------------------------

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Walk up directories to find `configs/retrieval/`.
 * Works from both source (packages/engine/src/config/) and compiled paths.
 */
export function findConfigsRoot(): string {
  let dir = __dirname;
  for (let i = 0; i < 10; i++) {
    const candidate = join(dir, "configs", "retrieval");
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return join(resolve(__dirname, "..", "..", "..", ".."), "configs", "retrieval");
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

/** Load base.json merged over the built-in defaults. */
export function loadBaseRetrievalConfig(configsRoot: string = findConfigsRoot()): RetrievalConfig {
  const filePath = join(configsRoot, "base.json");
  if (!existsSync(filePath)) return getDefaultRetrievalConfig();

  const parsed: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
  if (!isPlainObject(parsed)) {
    throw new InvalidInputError(`${filePath} must contain a JSON object`);
  }
  const defaults = getDefaultRetrievalConfig();
  return validateRetrievalConfig(deepMerge(asRecord(defaults), parsed));
}

function parseProfile(raw: unknown, filePath: string): RetrievalProfile {
  if (!isPlainObject(raw) || typeof raw["name"] !== "string") {
    throw new InvalidInputError(`${filePath} is not a retrieval profile`);
  }
  const overrides = raw["overrides"];
  return {
    name: raw["name"],
    description: typeof raw["description"] === "string" ? raw["description"] : "",
    overrides: isPlainObject(overrides) ? overrides : {},
  };
}

/** Load a named profile merged over the base config. */
export function loadRetrievalProfile(
  profileName: string,
  configsRoot: string = findConfigsRoot(),
): RetrievalConfig & { _profile: RetrievalProfileInfo } {
  if (!/^[a-z0-9-]+$/.test(profileName)) {
    throw new InvalidInputError(`invalid profile name "${profileName}"`);
  }
  const filePath = join(configsRoot, "profiles", `${profileName}.json`);
  if (!existsSync(filePath)) {
    throw new InvalidInputError(`unknown retrieval profile "${profileName}"`);
  }
  const profile = parseProfile(JSON.parse(readFileSync(filePath, "utf-8")), filePath);
  const base = loadBaseRetrievalConfig(configsRoot);
  const merged = validateRetrievalConfig(deepMerge(asRecord(base), profile.overrides));

  return {
    ...merged,
    _profile: { name: profile.name, description: profile.description },
  };
}

/** List all available profiles from the profiles directory. */
export function listRetrievalProfiles(configsRoot: string = findConfigsRoot()): RetrievalProfileInfo[] {
  const profilesDir = join(configsRoot, "profiles");
  if (!existsSync(profilesDir)) return [];

  const profiles: RetrievalProfileInfo[] = [];
  for (const file of readdirSync(profilesDir).filter((f) => f.endsWith(".json")).sort()) {
    const filePath = join(profilesDir, file);
    try {
      const profile = parseProfile(JSON.parse(readFileSync(filePath, "utf-8")), filePath);
      profiles.push({ name: profile.name, description: profile.description });
    } catch (err) {
      console.warn(`[config] Skipping malformed profile ${file}: ${String(err)}`);
    }
  }
  return profiles;
}

/**
 * Resolve the effective config: a named profile when given, else base.
 */
export function resolveRetrievalConfig(profileName?: string, configsRoot?: string): RetrievalConfig {
  if (profileName) {
    const { _profile: _p, ...config } = loadRetrievalProfile(profileName, configsRoot);
    return config;
  }
  return loadBaseRetrievalConfig(configsRoot);
}
