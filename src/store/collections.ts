import * as fs from "fs";
import * as path from "path";

/** Every collection the site persists, gallery or not. */
export const COLLECTION_NAMES = [
  "examples",
  "users",
  "estimates",
  "referrals",
  "testimonials",
] as const;

export type CollectionName = (typeof COLLECTION_NAMES)[number];

/**
 * Create an empty `<name>.json` array for each collection that has no file
 * yet. Existing files are left alone. Returns the names that were created.
 */
export function ensureJsonCollections(dataDir: string): CollectionName[] {
  fs.mkdirSync(dataDir, { recursive: true });
  const created: CollectionName[] = [];
  for (const name of COLLECTION_NAMES) {
    const filePath = path.join(dataDir, `${name}.json`);
    if (!fs.existsSync(filePath)) {
      fs.writeFileSync(filePath, "[]\n", "utf-8");
      created.push(name);
    }
  }
  return created;
}
