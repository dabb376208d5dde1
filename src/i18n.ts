import { LOCALES, type Lang, type Translations } from "./locales/index.js";

let _current: Translations = LOCALES.en;

export function setLang(lang: Lang): void {
  _current = LOCALES[lang];
}

export type MessageKey = keyof Translations;

// Placeholders look like {name}; unknown ones are left as written
export function t(key: MessageKey, params: Record<string, string | number> = {}): string {
  return _current[key].replace(/\{(\w+)\}/g, (whole, name: string) =>
    name in params ? String(params[name]) : whole
  );
}
