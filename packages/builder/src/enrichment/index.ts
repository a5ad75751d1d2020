export { PointSpatialIndex, type Located, type NearbyMatch } from "./spatial-index.js";
export { linkNearby, type NearLinkOptions, type NearLinkStats } from "./near-linker.js";
export {
  categoryOf,
  tagsOf,
  describePoi,
  imageForCategory,
  FALLBACK_CATEGORY,
  type OsmTags,
} from "./poi-profile.js";
