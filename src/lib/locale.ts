/**
 * Odoo language codes: `en_US`, `fr_BE`, `es_419`, `sr@latin`.
 */
export const LOCALE_PATTERN = /^[a-z]{2,3}(?:_(?:[A-Z]{2}|\d{3}))?(?:@[a-z]+)?$/;

/**
 * Odoo stores source terms in `en_US`; jsonb translations always carry it.
 */
export const SOURCE_LOCALE = 'en_US';

export const isValidLocale = (value: string): boolean => LOCALE_PATTERN.test(value);

/**
 * Ordered locales to try for a translated value: the requested locale, then
 * the configured default. The base column is the implicit last resort.
 */
export const localeChain = (requested: string | undefined, defaultLocale: string): string[] => {
  if (!requested || requested === defaultLocale) {
    return [defaultLocale];
  }
  return [requested, defaultLocale];
};
