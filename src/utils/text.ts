export const MAX_FIELD_LENGTH = 100;

/** Text before the first period, capped at `maxLength` code points. */
export const firstSentence = (text: string, maxLength = MAX_FIELD_LENGTH): string => {
  const end = text.indexOf('.');
  const sentence = end === -1 ? text : text.slice(0, end);
  return Array.from(sentence).slice(0, maxLength).join('');
};
