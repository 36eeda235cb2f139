export type Locale = "en" | "ru";

export type PlaceholderStrings = {
  bold: string;
  italic: string;
  code: string;
  linkText: string;
  linkUrl: string;
};

export type ToolbarStrings = {
  bold: string;
  italic: string;
  heading1: string;
  heading2: string;
  heading3: string;
  inlineCode: string;
  codeBlock: string;
  bulletList: string;
  numberedList: string;
  quote: string;
  link: string;
  horizontalRule: string;
};

export type LocaleStrings = {
  placeholders: PlaceholderStrings;
  toolbar: ToolbarStrings;
};

export const localeStrings: Record<Locale, LocaleStrings> = {
  en: {
    placeholders: {
      bold: "bold text",
      italic: "italic text",
      code: "code",
      linkText: "text",
      linkUrl: "url",
    },
    toolbar: {
      bold: "Bold",
      italic: "Italic",
      heading1: "Heading 1",
      heading2: "Heading 2",
      heading3: "Heading 3",
      inlineCode: "Code",
      codeBlock: "Code block",
      bulletList: "Bulleted list",
      numberedList: "Numbered list",
      quote: "Quote",
      link: "Link",
      horizontalRule: "Horizontal rule",
    },
  },
  ru: {
    placeholders: {
      bold: "жирный текст",
      italic: "курсивный текст",
      code: "код",
      linkText: "текст",
      linkUrl: "url",
    },
    toolbar: {
      bold: "Жирный",
      italic: "Курсив",
      heading1: "Заголовок 1",
      heading2: "Заголовок 2",
      heading3: "Заголовок 3",
      inlineCode: "Код",
      codeBlock: "Блок кода",
      bulletList: "Маркированный список",
      numberedList: "Нумерованный список",
      quote: "Цитата",
      link: "Ссылка",
      horizontalRule: "Горизонтальная линия",
    },
  },
};

/** Map a BCP 47 tag such as "ru-RU" onto a supported locale. */
export function resolveLocale(tag: string | null | undefined): Locale {
  const language = (tag ?? "").trim().toLowerCase().split(/[-_]/)[0];
  return language === "ru" ? "ru" : "en";
}
