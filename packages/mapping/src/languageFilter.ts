/**
 * Language filter lists such as `"eng, fre, pt br"`
 */

export function parseLanguageFilter(value: string): string[] {
  const languages: string[] = [];
  for (const token of value.split(',')) {
    const language = token.trim().toLowerCase().replace(/\s+/g, '-');
    if (language && !languages.includes(language)) {
      languages.push(language);
    }
  }
  return languages;
}
