import type { Catalog } from "../entities/Catalog.js";

/**
 * Loads the item catalog once at startup. Failures are fatal and surface as
 * `CatalogLoadError`.
 */
export interface CatalogSource {
  load(): Promise<Catalog>;
}
