export type TranslationParams = Record<string, string | number>;

/**
 * Port for localized message templates.
 */
export interface ITranslator {
    /**
     * Looks up `key` and fills `{name}` placeholders. Unknown keys return the
     * key itself; a template missing one of its parameters is returned unformatted.
     */
    t(key: string, params?: TranslationParams): string;
}
