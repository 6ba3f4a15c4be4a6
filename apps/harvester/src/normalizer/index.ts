export { normalizeRecord, synthesizeTitle, buildImageSet, PLACEHOLDER_TITLE, DEFAULT_WEBSITE } from './normalize.js'
export type { NormalizeContext } from './normalize.js'
export { toListingRow, toSnakeCase } from './listing-row.js'
export { KNOWN_BRANDS, brandFromTitle, brandAndModelFromTitle, findKnownBrand } from './brands.js'
export * from './coerce.js'
