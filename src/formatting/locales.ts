/**
 * BCP 47 tag -> date-fns locale resolution.
 *
 * @module formatting/locales
 */

import type { Locale as DateFnsLocale } from 'date-fns';
import { de, enAU, enCA, enGB, enUS, es, fr, frCA, it, ja, nl, pl, pt, ptBR, sv, zhCN } from 'date-fns/locale';

const DATE_FNS_LOCALES: Readonly<Record<string, DateFnsLocale>> = Object.freeze({
  en: enUS,
  'en-US': enUS,
  'en-GB': enGB,
  'en-AU': enAU,
  'en-CA': enCA,
  de,
  es,
  fr,
  'fr-CA': frCA,
  it,
  ja,
  nl,
  pl,
  pt,
  'pt-BR': ptBR,
  sv,
  zh: zhCN,
  'zh-CN': zhCN,
});

/**
 * Resolve a date-fns locale: exact tag first, then its language subtag,
 * then en-US.
 */
export function resolveDateLocale(tag: string): DateFnsLocale {
  const exact = DATE_FNS_LOCALES[tag];
  if (exact) {
    return exact;
  }
  const language = tag.split('-')[0].toLowerCase();
  return DATE_FNS_LOCALES[language] ?? enUS;
}
