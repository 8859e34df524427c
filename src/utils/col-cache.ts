// Column letter <-> number conversion with memoised lookups.
// Column numbers here are 1-based (A = 1) as in the file format;
// the 0-based helpers live in sheet-utils.

const MAX_COLUMN = 16384; // XFD
const MAX_ROW = 1048576;

export interface DecodedAddress {
  address: string;
  col: number;
  row: number;
}

const addressRegex = /^\$?([A-Za-z]{1,3})\$?([1-9]\d*)$/;

const colCache = {
  _l2nCache: new Map<string, number>(),
  _n2lCache: new Map<number, string>(),

  /** Letters to 1-based column number, `undefined` for anything that is not 1-3 letters */
  l2n(letters: string): number | undefined {
    const key = letters.toUpperCase();
    const cached = this._l2nCache.get(key);
    if (cached !== undefined) {
      return cached;
    }
    if (!/^[A-Z]{1,3}$/.test(key)) {
      return undefined;
    }
    let n = 0;
    for (let i = 0; i < key.length; i++) {
      n = n * 26 + (key.charCodeAt(i) - 64);
    }
    this._l2nCache.set(key, n);
    return n;
  },

  n2l(n: number): string {
    if (!Number.isInteger(n) || n < 1 || n > MAX_COLUMN) {
      throw new RangeError(`${n} is out of bounds. Excel supports columns from 1 to ${MAX_COLUMN}`);
    }
    const cached = this._n2lCache.get(n);
    if (cached !== undefined) {
      return cached;
    }
    let letters = "";
    let rest = n;
    while (rest > 0) {
      const rem = (rest - 1) % 26;
      letters = String.fromCharCode(65 + rem) + letters;
      rest = Math.floor((rest - 1) / 26);
    }
    this._n2lCache.set(n, letters);
    return letters;
  },

  /** `B12` → `{ col: 2, row: 12 }`; `undefined` when the text is not a cell address */
  decodeAddress(value: string): DecodedAddress | undefined {
    const match = addressRegex.exec(value);
    if (!match) {
      return undefined;
    }
    const col = this.l2n(match[1]);
    const row = parseInt(match[2], 10);
    if (col === undefined || col > MAX_COLUMN || row > MAX_ROW) {
      return undefined;
    }
    const letters = match[1].toUpperCase();
    return {
      address: `${letters}${row}`,
      col,
      row
    };
  },

  encodeAddress(row: number, col: number): string {
    return this.n2l(col) + row;
  }
};

export { colCache, MAX_COLUMN, MAX_ROW };
