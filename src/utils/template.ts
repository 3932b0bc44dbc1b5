export type TemplateValues = Readonly<Record<string, string | number>>;

const PLACEHOLDER = /\{(\w+)\}/g;

/** Fills `{name}` placeholders; unknown names are left as written. */
export const interpolate = (text: string, values: TemplateValues): string =>
  text.replace(PLACEHOLDER, (match, key: string) =>
    Object.hasOwn(values, key) ? String(values[key]) : match,
  );
