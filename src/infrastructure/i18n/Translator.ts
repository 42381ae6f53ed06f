import { ITranslator, TranslationParams } from '../../domain/ports/ITranslator';
import en from './locales/en.json';
import it from './locales/it.json';

type Catalog = Record<string, string>;

const CATALOGS: Record<string, Catalog> = { en, it };

const PLACEHOLDER = /\{(\w+)\}/g;

/**
 * Template lookup over the bundled locale catalogs. Unknown languages use English.
 */
export class Translator implements ITranslator {
    readonly language: string;
    private readonly strings: Catalog;

    constructor(language: string = 'en') {
        this.strings = CATALOGS[language] ?? CATALOGS.en;
        this.language = CATALOGS[language] ? language : 'en';
    }

    t(key: string, params?: TranslationParams): string {
        const template = this.strings[key] ?? key;
        if (!params) {
            return template;
        }

        const names = Array.from(template.matchAll(PLACEHOLDER), (match) => match[1]);
        if (names.some((name) => !(name in params))) {
            return template;
        }

        return template.replace(PLACEHOLDER, (_match, name: string) => String(params[name]));
    }
}
