import { readFile } from "node:fs/promises";

import { Catalog, CatalogLoadError, type CatalogSource, type Logger } from "../core.js";

/** Reads the flat catalog file once; an unreadable or empty file is fatal. */
export class FileCatalogSource implements CatalogSource {
  constructor(
    private readonly path: string,
    private readonly logger?: Logger,
  ) {}

  async load(): Promise<Catalog> {
    let text: string;
    try {
      text = await readFile(this.path, "utf8");
    } catch (error) {
      throw new CatalogLoadError(this.path, "file could not be read", { cause: error });
    }

    const catalog = Catalog.parse(text);
    if (catalog.size === 0) {
      throw new CatalogLoadError(this.path, "no categories found");
    }

    this.logger?.info?.("Catalog loaded", {
      path: this.path,
      categories: catalog.size,
    });
    return catalog;
  }
}
