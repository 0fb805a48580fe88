export { loadLabelCatalog } from './label-catalog'
export type { LabelCatalog } from './label-catalog'
