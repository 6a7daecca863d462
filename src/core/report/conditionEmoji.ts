export const FALLBACK_EMOJI = '🌈';

interface CodeRange {
  from: number;
  to: number;
  emoji: string;
}

// OpenWeatherMap condition codes. Order matters: specific codes come before
// the group range that contains them.
const CODE_RANGES: readonly CodeRange[] = [
  { from: 200, to: 232, emoji: '⛈️' },
  { from: 300, to: 321, emoji: '🌦️' },
  { from: 511, to: 511, emoji: '🌨️' },
  { from: 500, to: 531, emoji: '🌧️' },
  { from: 600, to: 622, emoji: '❄️' },
  { from: 781, to: 781, emoji: '🌪️' },
  { from: 771, to: 771, emoji: '💨' },
  { from: 701, to: 762, emoji: '🌫️' },
  { from: 800, to: 800, emoji: '☀️' },
  { from: 801, to: 801, emoji: '🌤️' },
  { from: 802, to: 802, emoji: '⛅' },
  { from: 803, to: 804, emoji: '☁️' },
];

const KEYWORDS: ReadonlyArray<[RegExp, string]> = [
  [/thunderstorm/, '⛈️'],
  [/drizzle/, '🌦️'],
  [/rain/, '🌧️'],
  [/snow/, '❄️'],
  [/clear/, '☀️'],
  [/cloud/, '☁️'],
  [/fog|mist|haze/, '🌫️'],
];

export function emojiForCode(code: number): string | undefined {
  return CODE_RANGES.find((range) => code >= range.from && code <= range.to)?.emoji;
}

export function emojiForDescription(description: string): string | undefined {
  const text = description.toLowerCase();
  return KEYWORDS.find(([pattern]) => pattern.test(text))?.[1];
}

/** Picks a glyph by condition code, then by description keywords, then the fallback. */
export function getWeatherEmoji(code: number | null, description: string): string {
  const byCode = code === null ? undefined : emojiForCode(code);
  return byCode ?? emojiForDescription(description) ?? FALLBACK_EMOJI;
}
