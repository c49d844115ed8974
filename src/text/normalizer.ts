/**
 * Strips inline annotation markers from recognized text.
 *
 * SenseVoice output interleaves the transcript with markers such as
 * `<|zh|>`, emotion tags (`|HAPPY|`) and audio-event spans
 * (`|Applause|...|/Applause|`).
 */

export interface TagStripOptions {
  /** When false the text is returned untouched. */
  removeTags?: boolean;
  /** Also drop `[...]` spans. */
  stripBrackets?: boolean;
}

const ANGLE_SPAN = /<[^>]*>/g;
const BRACKET_SPAN = /\[[^\]]*\]/g;
const EMOTION_TAG = /\|[A-Z]+\|/g;
const EVENT_CLOSE = /\|\/[A-Za-z]+\|/g;
const EVENT_OPEN = /\|[A-Za-z]+\|/g;
const WHITESPACE_RUN = /\s+/g;

// Order matters: closing event markers must go before opening ones, and
// emotion tags before both. Removing a marker can join its neighbours into
// a new one, so the passes repeat until nothing changes.
export function cleanTranscript(
  text: string,
  options: TagStripOptions = {},
): string {
  if (options.removeTags === false) return text;

  let out = text;
  for (;;) {
    let next = out.replace(ANGLE_SPAN, "");
    if (options.stripBrackets) next = next.replace(BRACKET_SPAN, "");
    next = next
      .replace(EMOTION_TAG, "")
      .replace(EVENT_CLOSE, "")
      .replace(EVENT_OPEN, "");
    if (next === out) break;
    out = next;
  }

  return out.replace(WHITESPACE_RUN, " ").trim();
}

export function createNormalizer(
  options: TagStripOptions = {},
): (text: string) => string {
  return (text) => cleanTranscript(text, options);
}
