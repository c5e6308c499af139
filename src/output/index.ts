/**
 * Output module exports
 */

export { printType, printUnionType } from './printer.js';
export {
  formatType,
  formatAsInlineComments,
  formatAsJSON,
  formatAsDTS,
  formatAsReport,
  type FormatOptions,
} from './formatter.js';
