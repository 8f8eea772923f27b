export { parseStylesheet, parseValue } from "./parser.js";
export type { StylesheetParseOptions } from "./parser.js";
export {
  matches,
  specificity,
  compareSpecificity,
  matchingRules,
  cascade,
  styleTree,
  resolveStyles,
} from "./apply.js";
export type { MatchedRule, ResolveOptions } from "./apply.js";
