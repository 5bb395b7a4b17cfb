const localeNames: Record<string, string> = {
  ja: '日本語 (Japanese)',
  en: 'English',
  ko: '한국어 (Korean)',
  zh: '中文 (Chinese)',
};

export function localeName(locale: string): string {
  return localeNames[locale] || localeNames.en;
}

export function createMapPrompt(): string {
  return `Summarize the following content, keeping as much of the important information as possible:


"{text}"


SUMMARY:`;
}

export function createReducePrompt(locale: string): string {
  return `Summarize the following content concisely, in no more than 200 characters of ${localeName(locale)}:


"{text}"


CONCISE SUMMARY:`;
}

export function createAnswerPrompt(query: string, locale: string): string {
  return `The parts above are excerpts from a video transcript, each prefixed with its start time.
Answer the question below using only those excerpts.
If the excerpts do not contain the answer, say that you don't know instead of guessing.
Write the answer in ${localeName(locale)}.

QUESTION: ${query}
ANSWER:`;
}

/**
 * Fill the `{text}` placeholder. Uses split/join so `$` sequences in transcript
 * text are inserted verbatim.
 */
export function renderTemplate(template: string, text: string): string {
  return template.split('{text}').join(text);
}
