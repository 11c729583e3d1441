export { parseMagnitude } from "./magnitude.ts";
export {
  selectMetrics,
  classifyLine,
  tokenizeLine,
  isDataRow,
  type LineKind,
} from "./sreport.ts";
