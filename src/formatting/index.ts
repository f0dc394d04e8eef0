/**
 * Formatting Module
 *
 * Narrow parse/format collaborators over date-fns and Intl. Stages choose
 * which pattern to try and in what order; these functions do the work.
 *
 * @module formatting
 */

export { resolveDateLocale } from './locales.js';
export {
  localeDateOrder,
  freeFormPatterns,
  parseDateExact,
  parseDateFreeForm,
  formatDate,
} from './dates.js';
export {
  type NumberSymbols,
  getNumberSymbols,
  INT32_MIN,
  INT32_MAX,
  parseNumber,
  parseInt32,
  parseBoolean,
  parseGuid,
  formatNumber,
  formatPlainNumber,
} from './numbers.js';
