/**
 * Timestamp - the rich temporal value behind `datetime` casts.
 *
 * Storage uses one canonical text form, `yyyy-MM-dd'T'HH:mm:ss` in local time,
 * for both attribute writes and serialisation.
 */

import {format as formatDate, isValid, parseISO, differenceInSeconds} from "date-fns";
import {Inspect} from "./inspect.js";

export const CANONICAL_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";

export class Timestamp {
  private constructor(private readonly date: Date) {}

  static {
    Inspect(this, (self) => ({ format: "Timestamp(%s)", params: [self.format()] }));
  }

  static now(): Timestamp {
    return new Timestamp(new Date());
  }

  static fromDate(date: Date): Timestamp {
    return new Timestamp(new Date(date.getTime()));
  }

  static fromMillis(ms: number): Timestamp {
    return new Timestamp(new Date(ms));
  }

  /** Parse ISO-8601 text. Returns null when the text is not a valid date. */
  static parse(text: string): Timestamp | null {
    const date = parseISO(text);
    return isValid(date) ? new Timestamp(date) : null;
  }

  /** date-fns pattern, canonical storage form by default */
  format(pattern: string = CANONICAL_FORMAT): string {
    return formatDate(this.date, pattern);
  }

  toDate(): Date {
    return new Date(this.date.getTime());
  }

  toISOString(): string {
    return this.date.toISOString();
  }

  getTime(): number {
    return this.date.getTime();
  }

  get year(): number {
    return this.date.getFullYear();
  }

  /** 1-based */
  get month(): number {
    return this.date.getMonth() + 1;
  }

  get day(): number {
    return this.date.getDate();
  }

  isSame(other: Timestamp): boolean {
    return this.date.getTime() === other.date.getTime();
  }

  diffInSeconds(other: Timestamp): number {
    return differenceInSeconds(this.date, other.date);
  }

  toJSON(): string {
    return this.format();
  }

  toString(): string {
    return this.format();
  }
}
