/**
 * Bitmap - Single-Channel Binary Grid
 *
 * Backing store for both the stroke buffer and the region mask.
 * One byte per pixel, row-major, every cell 0 or 1.
 */
import { DimensionMismatchError } from "./errors";

export class Bitmap {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;

  constructor(width: number, height: number, data?: Uint8Array) {
    this.width = width;
    this.height = height;
    if (data && data.length !== width * height) {
      throw new DimensionMismatchError({ width, height }, { width: data.length, height: 1 });
    }
    this.data = data ?? new Uint8Array(width * height);
  }

  static empty(width: number, height: number): Bitmap {
    return new Bitmap(width, height);
  }

  /**
   * Build a bitmap from rows of "#" (set) and "." (unset)
   */
  static fromRows(rows: string[]): Bitmap {
    const height = rows.length;
    const width = height > 0 ? rows[0].length : 0;
    const bitmap = new Bitmap(width, height);
    rows.forEach((row, y) => {
      if (row.length !== width) {
        throw new DimensionMismatchError({ width, height }, { width: row.length, height });
      }
      for (let x = 0; x < width; x++) {
        if (row[x] === "#") bitmap.data[y * width + x] = 1;
      }
    });
    return bitmap;
  }

  get(x: number, y: number): number {
    if (!this.contains(x, y)) return 0;
    return this.data[y * this.width + x];
  }

  set(x: number, y: number, value: 0 | 1) {
    if (!this.contains(x, y)) return;
    this.data[y * this.width + x] = value;
  }

  contains(x: number, y: number): boolean {
    return x >= 0 && y >= 0 && x < this.width && y < this.height;
  }

  reset() {
    this.data.fill(0);
  }

  count(): number {
    let total = 0;
    for (let i = 0; i < this.data.length; i++) total += this.data[i];
    return total;
  }

  isEmpty(): boolean {
    return this.data.every((v) => v === 0);
  }

  sameSize(other: { width: number; height: number }): boolean {
    return this.width === other.width && this.height === other.height;
  }

  equals(other: Bitmap): boolean {
    if (!this.sameSize(other)) return false;
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] !== other.data[i]) return false;
    }
    return true;
  }

  clone(): Bitmap {
    return new Bitmap(this.width, this.height, this.data.slice());
  }

  toRows(): string[] {
    const rows: string[] = [];
    for (let y = 0; y < this.height; y++) {
      let row = "";
      for (let x = 0; x < this.width; x++) row += this.data[y * this.width + x] ? "#" : ".";
      rows.push(row);
    }
    return rows;
  }
}
