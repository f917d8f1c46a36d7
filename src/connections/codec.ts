/**
 * JSON when the payload parses, otherwise the raw text.
 */
export const decodeBody = (text: string): unknown => {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
};
