import { TextDecoder } from "util";

/**
 * Mojibake detection for text that was written as UTF-8 but read back as
 * Windows-1252, which turns `’` into `â€™` and `—` into `â€”`.
 *
 * Each suspicious run is mapped back to its Windows-1252 bytes and decoded as
 * UTF-8. Only runs that decode to a valid character are reported, so ordinary
 * accented text (`café`, `naïve`) is left alone.
 */

export interface EncodingAnomaly {
  line: number;
  column: number;
  broken: string;
  repaired: string;
}

// Windows-1252 assigns printable characters to most of 0x80-0x9F.
const CP1252_SPECIALS: ReadonlyMap<number, number> = new Map([
  [0x20ac, 0x80],
  [0x201a, 0x82],
  [0x0192, 0x83],
  [0x201e, 0x84],
  [0x2026, 0x85],
  [0x2020, 0x86],
  [0x2021, 0x87],
  [0x02c6, 0x88],
  [0x2030, 0x89],
  [0x0160, 0x8a],
  [0x2039, 0x8b],
  [0x0152, 0x8c],
  [0x017d, 0x8e],
  [0x2018, 0x91],
  [0x2019, 0x92],
  [0x201c, 0x93],
  [0x201d, 0x94],
  [0x2022, 0x95],
  [0x2013, 0x96],
  [0x2014, 0x97],
  [0x02dc, 0x98],
  [0x2122, 0x99],
  [0x0161, 0x9a],
  [0x203a, 0x9b],
  [0x0153, 0x9c],
  [0x017e, 0x9e],
  [0x0178, 0x9f],
]);

const hex = (code: number): string => `\\u${code.toString(16).padStart(4, "0")}`;

const CONTINUATION = `[\\u0080-\\u00bf${[...CP1252_SPECIALS.keys()].map(hex).join("")}]`;
const SEQUENCE = new RegExp(`[\\u00c2-\\u00f4]${CONTINUATION}{1,3}`, "g");

const decoder = new TextDecoder("utf-8", { fatal: true });

const toByte = (char: string): number => {
  const code = char.codePointAt(0) ?? 0;
  return code <= 0xff ? code : CP1252_SPECIALS.get(code) ?? 0;
};

const expectedLength = (lead: number): number => {
  if (lead >= 0xf0) return 4;
  if (lead >= 0xe0) return 3;
  return 2;
};

interface Repair {
  broken: string;
  repaired: string;
  rest: string;
}

const repairRun = (run: string): Repair | null => {
  const chars = Array.from(run);
  const length = expectedLength(toByte(chars[0] ?? ""));
  if (chars.length < length) {
    return null;
  }
  const broken = chars.slice(0, length);
  try {
    const repaired = decoder.decode(Uint8Array.from(broken.map(toByte)));
    return { broken: broken.join(""), repaired, rest: chars.slice(length).join("") };
  } catch {
    return null;
  }
};

export const findEncodingAnomalies = (text: string): EncodingAnomaly[] => {
  const anomalies: EncodingAnomaly[] = [];
  text.split(/\r?\n/).forEach((lineText, index) => {
    for (const match of lineText.matchAll(SEQUENCE)) {
      const repair = repairRun(match[0]);
      if (repair) {
        anomalies.push({
          line: index + 1,
          column: (match.index ?? 0) + 1,
          broken: repair.broken,
          repaired: repair.repaired,
        });
      }
    }
  });
  return anomalies;
};

export const repairEncoding = (text: string): string =>
  text.replace(SEQUENCE, (run) => {
    const repair = repairRun(run);
    return repair ? repair.repaired + repair.rest : run;
  });
