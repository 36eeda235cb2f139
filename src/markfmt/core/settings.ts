import {
  localeStrings,
  type Locale,
  type PlaceholderStrings,
  type ToolbarStrings,
} from "../l10n/strings";

export type FormattingSettings = {
  locale: Locale;
  placeholders?: Partial<PlaceholderStrings>;
};

const placeholderKeys: Array<keyof PlaceholderStrings> = [
  "bold",
  "italic",
  "code",
  "linkText",
  "linkUrl",
];

export const defaultFormattingSettings: FormattingSettings = {
  locale: "en",
};

export function resolvePlaceholders(
  settings: FormattingSettings = defaultFormattingSettings,
): PlaceholderStrings {
  const base = localeStrings[settings.locale].placeholders;
  if (!settings.placeholders) {
    return base;
  }

  // Empty overrides would leave nothing to select, keep the locale string.
  const merged: PlaceholderStrings = { ...base };
  for (const key of placeholderKeys) {
    const override = settings.placeholders[key];
    if (override) {
      merged[key] = override;
    }
  }
  return merged;
}

export function resolveToolbarStrings(
  settings: FormattingSettings = defaultFormattingSettings,
): ToolbarStrings {
  return localeStrings[settings.locale].toolbar;
}
