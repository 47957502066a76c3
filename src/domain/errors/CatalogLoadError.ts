export class CatalogLoadError extends Error {
  constructor(
    public readonly source: string,
    reason: string,
    options?: { readonly cause?: unknown },
  ) {
    super(`Failed to load catalog from ${source}: ${reason}`, options);
    this.name = "CatalogLoadError";
  }
}
