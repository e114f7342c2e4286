export const decodeEntities = (text: string): string =>
  text
    .replace(/&nbsp;/g, ' ')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&apos;/g, "'")
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&#(\d+);/g, (_match, num: string) => {
      const code = Number(num);
      return Number.isFinite(code) ? String.fromCharCode(code) : '';
    })
    .replace(/&#x([0-9a-f]+);/gi, (_match, hex: string) => {
      const code = Number.parseInt(hex, 16);
      return Number.isFinite(code) ? String.fromCharCode(code) : '';
    })
    // last, so "&amp;lt;" decodes to "&lt;" rather than "<"
    .replace(/&amp;/g, '&');

export const stripTags = (value: string): string => value.replace(/<[^>]*>/g, ' ');

export const normalizeWhitespace = (text: string): string => text.replace(/\u00a0/g, ' ').replace(/\s+/g, ' ').trim();

const toHex = (value: number) => value.toString(16).padStart(8, '0');

/** FNV-1a, used for stable deal and entry ids. */
export const hashString = (value: string): string => {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i += 1) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return toHex(hash);
};
