import type { AppConfig } from '../../shared/config';
import { isPlaceholderImage } from './types';

const STOP_WORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'for', 'from', 'in', 'into', 'is', 'it',
  'its', 'of', 'on', 'or', 'that', 'the', 'this', 'to', 'was', 'were', 'will', 'with', 'your',
]);

const DEAL_KEYWORDS = new Set([
  'deal', 'deals', 'sale', 'discount', 'off', 'save', 'savings', 'clearance', 'limited', 'special',
  'offer', 'bargain', 'best', 'top', 'price', 'drop', 'lowest', 'coupon',
]);

const WEIGHTS = {
  exact: 0.4,
  sequence: 0.2,
  order: 0.2,
  proximity: 0.2,
} as const;

const PRICE_PATTERN = /\$\s?(\d{1,3}(?:,\d{3})+|\d+)(?:\.(\d+))?/;

interface PositionedToken {
  token: string;
  offset: number;
}

/** Lower-cased, stop-word-free tokens with their character offset in the lower-cased text. */
export const tokenizeWithOffsets = (text: string): PositionedToken[] => {
  const cleaned = text.toLowerCase().replace(/[^a-z0-9\s-]/g, ' ');
  const out: PositionedToken[] = [];
  const re = /\S+/g;
  let match: RegExpExecArray | null;
  while ((match = re.exec(cleaned)) !== null) {
    const token = match[0].replace(/^-+|-+$/g, '');
    if (!token || STOP_WORDS.has(token)) continue;
    out.push({ token, offset: match.index + match[0].indexOf(token) });
  }
  return out;
};

export const tokenize = (text: string): string[] => tokenizeWithOffsets(text).map((t) => t.token);

const longestCommonSubsequence = (a: string, b: string): number => {
  if (!a.length || !b.length) return 0;
  let previous = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i += 1) {
    const current = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j += 1) {
      current[j] = a[i - 1] === b[j - 1] ? previous[j - 1] + 1 : Math.max(previous[j], current[j - 1]);
    }
    previous = current;
  }
  return previous[b.length];
};

export const sequenceSimilarity = (a: string, b: string): number => {
  const left = a.trim().toLowerCase();
  const right = b.trim().toLowerCase();
  const total = left.length + right.length;
  if (total === 0) return 0;
  return (2 * longestCommonSubsequence(left, right)) / total;
};

const containsContiguous = (haystack: string[], needle: string[]): boolean => {
  if (!needle.length || needle.length > haystack.length) return false;
  for (let start = 0; start + needle.length <= haystack.length; start += 1) {
    if (needle.every((token, i) => haystack[start + i] === token)) {
      return true;
    }
  }
  return false;
};

const proximityBonus = (offsets: number[]): number => {
  if (offsets.length < 2) return 0;
  let total = 0;
  let pairs = 0;
  for (let i = 0; i < offsets.length; i += 1) {
    for (let j = i + 1; j < offsets.length; j += 1) {
      total += Math.abs(offsets[i] - offsets[j]);
      pairs += 1;
    }
  }
  return 1 / (1 + total / pairs);
};

/**
 * Weighted match between a listing title and the search keyword, in [0, 1].
 * Signals: exact token coverage, whole-string LCS ratio, contiguous order and
 * proximity of the matched keyword tokens.
 */
export const computeRelevance = (title: string, keyword: string): number => {
  const keywordTokens = tokenize(keyword);
  if (!keywordTokens.length) return 0;

  const titleTokens = tokenizeWithOffsets(title);
  const firstOffset = new Map<string, number>();
  for (const { token, offset } of titleTokens) {
    if (!firstOffset.has(token)) firstOffset.set(token, offset);
  }

  const uniqueKeyword = Array.from(new Set(keywordTokens));
  const found = uniqueKeyword.filter((token) => firstOffset.has(token));

  const exact = found.length / uniqueKeyword.length;
  const sequence = sequenceSimilarity(title, keyword);
  const order = containsContiguous(
    titleTokens.map((t) => t.token),
    keywordTokens,
  )
    ? 1
    : 0;
  const proximity = proximityBonus(found.map((token) => firstOffset.get(token) ?? 0));

  const score =
    exact * WEIGHTS.exact + sequence * WEIGHTS.sequence + order * WEIGHTS.order + proximity * WEIGHTS.proximity;
  return Math.min(1, Math.max(0, score));
};

/** First dollar amount in the text, 0 when none. */
export const extractPrice = (text: string): number => {
  const match = text.match(PRICE_PATTERN);
  if (!match) return 0;
  const whole = match[1].replace(/,/g, '');
  const value = Number(match[2] ? `${whole}.${match[2]}` : whole);
  return Number.isFinite(value) && value > 0 ? value : 0;
};

export const hasDealIndicator = (title: string): boolean => tokenize(title).some((token) => DEAL_KEYWORDS.has(token));

export const applyBoosts = (
  base: number,
  signals: { price: number; image: string },
  scoring: AppConfig['scoring'],
): number => {
  let score = base;
  if (signals.price > 0) score *= scoring.priceBoost;
  if (!isPlaceholderImage(signals.image)) score *= scoring.imageBoost;
  return Number(Math.min(1, Math.max(0, score)).toFixed(4));
};
