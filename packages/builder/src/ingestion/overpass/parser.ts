/**
 * Overpass JSON response → POI nodes.
 *
 * Only named nodes become POIs; ways and relations are ignored since the
 * query requests `out body` on nodes only.
 */

import type { PoiNode } from "@transit-vibes/types";
import type { OverpassJson, OverpassNode } from "overpass-ts";
import {
  categoryOf,
  describePoi,
  imageForCategory,
  tagsOf,
  type OsmTags,
} from "../../enrichment/poi-profile.js";

type OverpassElement = OverpassJson["elements"][number];

function isNodeElement(element: OverpassElement): element is OverpassNode {
  return element.type === "node";
}

/** Convert one Overpass node; null when it has no name. */
export function poiFromElement(node: OverpassNode): PoiNode | null {
  const tags: OsmTags = node.tags ?? {};
  const name = tags["name"]?.trim();
  if (!name) return null;

  const category = categoryOf(tags);
  return {
    kind: "poi",
    id: String(node.id),
    name,
    location: { lat: node.lat, lng: node.lon },
    tags: tagsOf(tags),
    description: describePoi(name, category, tags),
    category,
    imageUrl: imageForCategory(category),
  };
}

/**
 * Parse an Overpass JSON response into POI nodes, deduplicated by OSM id.
 *
 * @param response - Overpass JSON response from fetchPoiData()
 */
export function parsePoiResponse(response: OverpassJson): PoiNode[] {
  const seen = new Set<string>();
  const pois: PoiNode[] = [];
  let unnamed = 0;

  for (const element of response.elements) {
    if (!isNodeElement(element)) continue;
    const poi = poiFromElement(element);
    if (!poi) {
      unnamed++;
      continue;
    }
    if (seen.has(poi.id)) continue;
    seen.add(poi.id);
    pois.push(poi);
  }

  console.log(`[overpass] Parsed ${pois.length} POIs (${unnamed} unnamed nodes skipped)`);
  return pois;
}
