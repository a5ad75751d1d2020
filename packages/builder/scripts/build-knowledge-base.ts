/**
 * Build a knowledge base snapshot from a GTFS feed and Overpass POIs.
 *
 * Usage: npx tsx scripts/build-knowledge-base.ts <gtfs-dir> [output.sqlite] [--force] [--no-cache]
 *        [--bbox=minLat,minLng,maxLat,maxLng] [--near=400]
 *
 * Options:
 *   --force      Refetch POIs even when a cached Overpass response exists
 *   --no-cache   Do not read or write the Overpass cache
 *   --bbox       Area to build for (default: central Helsinki)
 *   --near       Maximum IS_NEAR distance in meters
 *
 * The encoder comes from EMBEDDING_* environment variables, the same way
 * the server picks it. Default output: ../../data/knowledge-base.sqlite
 */

import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { createQueryEncoder, encoderSettingsFromEnv } from "@transit-vibes/engine";
import type { BoundingBox } from "@transit-vibes/types";
import { buildKnowledgeBase } from "../src/knowledge-base/index.js";
import { writeSnapshot } from "../src/snapshot/index.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// ── CLI ──────────────────────────────────────────────────────────────

const args = process.argv.slice(2);
const flags = args.filter((a) => a.startsWith("--"));
const positional = args.filter((a) => !a.startsWith("--"));

function flagValue(name: string): string | undefined {
  const prefix = `--${name}=`;
  return flags.find((f) => f.startsWith(prefix))?.slice(prefix.length);
}

function parseBbox(raw: string): BoundingBox {
  const parts = raw.split(",").map(Number);
  const [minLat, minLng, maxLat, maxLng] = parts;
  if (
    parts.length !== 4 ||
    minLat === undefined ||
    minLng === undefined ||
    maxLat === undefined ||
    maxLng === undefined ||
    parts.some((n) => !Number.isFinite(n))
  ) {
    throw new Error(`Invalid --bbox "${raw}", expected minLat,minLng,maxLat,maxLng`);
  }
  return { minLat, minLng, maxLat, maxLng };
}

const gtfsDir = positional[0];
if (!gtfsDir) {
  console.error("Usage: npx tsx scripts/build-knowledge-base.ts <gtfs-dir> [output.sqlite]");
  process.exit(1);
}
const outputPath = resolve(positional[1] ?? resolve(__dirname, "../../../data/knowledge-base.sqlite"));

// ── Main ─────────────────────────────────────────────────────────────

async function main() {
  const bboxFlag = flagValue("bbox");
  const nearFlag = flagValue("near");

  const { snapshot, stats } = await buildKnowledgeBase({
    gtfsDir: resolve(gtfsDir ?? "."),
    bbox: bboxFlag ? parseBbox(bboxFlag) : undefined,
    maxNearDistanceMeters: nearFlag ? Number(nearFlag) : undefined,
    encoder: createQueryEncoder(encoderSettingsFromEnv()),
    overpass: {
      force: flags.includes("--force"),
      noCache: flags.includes("--no-cache"),
    },
  });

  writeSnapshot(outputPath, snapshot);

  console.log("");
  console.log(`Stops:         ${stats.stops.toLocaleString()}`);
  console.log(`Routes:        ${stats.routes.toLocaleString()}`);
  console.log(`POIs:          ${stats.pois.toLocaleString()} (${stats.linking.isolatedPois} without a stop)`);
  console.log(`Relationships: ${stats.relationships.toLocaleString()}`);
  console.log(`Embeddings:    ${stats.embeddings.toLocaleString()}`);
  console.log(`\nSaved to: ${outputPath}`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
