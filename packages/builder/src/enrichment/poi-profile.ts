/**
 * Descriptive profile of a POI from its OSM tags: primary category,
 * searchable tag set, description text for embedding, and a vibe image.
 */

/** OSM tags as key-value pairs */
export type OsmTags = Record<string, string>;

/** Tag keys whose values name the kind of place, in priority order */
const CATEGORY_KEYS = ["tourism", "leisure", "amenity", "historic"] as const;

/** Extra tags whose values say something about the atmosphere */
const DESCRIPTIVE_KEYS = ["cuisine", "artwork_type", "museum", "sport", "garden:type", "building"] as const;

export const FALLBACK_CATEGORY = "landmark";

const IMAGES = {
  museum: "https://images.unsplash.com/photo-1545989253-02cc26577f88?w=400&q=80",
  park: "https://images.unsplash.com/photo-1496347312933-125c92842fa3?w=400&q=80",
  viewpoint: "https://images.unsplash.com/photo-1502786129293-79981cb61638?w=400&q=80",
  sauna: "https://images.unsplash.com/photo-1574673627192-3c46927d2c3c?w=400&q=80",
  default: "https://images.unsplash.com/photo-1538332539566-b5d1e679a636?w=400&q=80",
};

function humanize(value: string): string {
  return value.replace(/[_;]+/g, " ").trim();
}

/** First category tag present, else "landmark" */
export function categoryOf(tags: OsmTags): string {
  for (const key of CATEGORY_KEYS) {
    const value = tags[key];
    if (value && value !== "yes") return value;
  }
  return FALLBACK_CATEGORY;
}

/** Sorted, unique tag values used for display and matching */
export function tagsOf(tags: OsmTags): string[] {
  const values = new Set<string>();
  for (const key of [...CATEGORY_KEYS, ...DESCRIPTIVE_KEYS]) {
    const value = tags[key];
    if (!value || value === "yes" || value === "no") continue;
    for (const part of value.split(";")) {
      const clean = humanize(part).toLowerCase();
      if (clean) values.add(clean);
    }
  }
  return [...values].sort();
}

/** Text the embedding is derived from. */
export function describePoi(name: string, category: string, tags: OsmTags): string {
  const parts = [`${name} (${humanize(category)})`];
  const extra = tagsOf(tags).filter((t) => t !== humanize(category).toLowerCase());
  if (extra.length > 0) parts.push(extra.join(", "));
  const note = tags["description"];
  if (note) parts.push(note);
  return parts.join(". ");
}

export function imageForCategory(category: string): string {
  const c = category.toLowerCase();
  if (c.includes("museum") || c.includes("art")) return IMAGES.museum;
  if (c.includes("park") || c.includes("garden")) return IMAGES.park;
  if (c.includes("view")) return IMAGES.viewpoint;
  if (c.includes("sauna")) return IMAGES.sauna;
  return IMAGES.default;
}
