import { POI_CATEGORIES, type PoiCategory } from "./poi.types";

export type CategoryInfo = {
  displayName: string;
  defaultRadius: number;
};

export const categoryInfo: Record<PoiCategory, CategoryInfo> = {
  SHOP: { displayName: "Shop", defaultRadius: 30 },
  RESTAURANT: { displayName: "Restaurant", defaultRadius: 30 },
  TOURIST_ATTRACTION: { displayName: "Tourist Attraction", defaultRadius: 100 },
  PUBLIC_TRANSPORT: { displayName: "Public Transport", defaultRadius: 50 },
  AMENITY: { displayName: "Amenity", defaultRadius: 30 },
  HISTORIC: { displayName: "Historic Site", defaultRadius: 75 },
  NATURAL: { displayName: "Natural Feature", defaultRadius: 100 },
  INFRASTRUCTURE: { displayName: "Infrastructure", defaultRadius: 50 },
  UNKNOWN: { displayName: "Unknown", defaultRadius: 50 }
};

type CategoryRule = {
  category: PoiCategory;
  matches: (type: string, name: string) => boolean;
};

const keywordRule = (
  category: PoiCategory,
  typeKeywords: string[],
  nameKeywords: string[]
): CategoryRule => ({
  category,
  matches: (type, name) =>
    typeKeywords.some((k) => type.includes(k)) || nameKeywords.some((k) => name.includes(k))
});

/**
 * Ordered rule table. The first matching row decides the category, so text
 * that hits several rows always resolves to the earliest one.
 */
export const categoryRules: readonly CategoryRule[] = [
  keywordRule("SHOP", ["shop"], ["shop", "store"]),
  keywordRule("RESTAURANT", ["restaurant"], ["restaurant", "cafe"]),
  keywordRule("TOURIST_ATTRACTION", ["tourist", "attraction"], ["monument"]),
  keywordRule("PUBLIC_TRANSPORT", ["transport"], ["station", "stop"]),
  keywordRule("AMENITY", ["amenity"], ["toilet", "parking"]),
  keywordRule("HISTORIC", ["historic"], ["castle", "church"]),
  keywordRule("NATURAL", ["natural"], ["park", "peak"]),
  keywordRule("INFRASTRUCTURE", ["infrastructure"], ["bridge", "tower"])
];

export const classifyCategory = (typeHint: string | undefined, nameHint: string): PoiCategory => {
  const type = (typeHint ?? "").toLowerCase();
  const name = nameHint.toLowerCase();

  const rule = categoryRules.find((r) => r.matches(type, name));
  return rule ? rule.category : "UNKNOWN";
};

export const parsePoiCategory = (value: string): PoiCategory => {
  const normalized = value.trim().toUpperCase();
  return POI_CATEGORIES.find((category) => category === normalized) ?? "UNKNOWN";
};
