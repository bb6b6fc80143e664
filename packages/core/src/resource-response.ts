/**
 * ResourceResponse - a decoded HTTP response from a remote resource.
 *
 * Error statuses are ordinary responses; only transport failures throw.
 */

import {Envelope} from "./envelope.js";
import {Inspect} from "./inspect.js";
import {isPlainObject} from "./plain.js";

export interface ResourceResponseInit {
  statusCode: number;
  data?: unknown;
  headers?: Record<string, string>;
  /** Status text or transport message */
  message?: string;
}

export class ResourceResponse {
  readonly statusCode: number;
  readonly data: unknown;
  readonly headers: Readonly<Record<string, string>>;
  readonly message: string | null;

  static {
    Inspect(this, (self) => ({
      format: "ResourceResponse(%d) %O",
      params: [self.statusCode, self.data],
    }));
  }

  constructor(init: ResourceResponseInit) {
    this.statusCode = init.statusCode;
    this.data = init.data ?? null;
    this.headers = Object.freeze({ ...init.headers });
    this.message = init.message ?? null;
  }

  get successful(): boolean {
    return this.statusCode >= 200 && this.statusCode < 300;
  }

  get failed(): boolean {
    return this.statusCode >= 400;
  }

  get clientError(): boolean {
    return this.statusCode >= 400 && this.statusCode < 500;
  }

  get serverError(): boolean {
    return this.statusCode >= 500;
  }

  get unauthorized(): boolean {
    return this.statusCode === 401;
  }

  get forbidden(): boolean {
    return this.statusCode === 403;
  }

  get notFound(): boolean {
    return this.statusCode === 404;
  }

  get isValidationError(): boolean {
    return this.statusCode === 422;
  }

  /** Validation messages by field, from a `{ errors: { field: [...] } }` body */
  get errors(): Record<string, string[]> {
    if (!isPlainObject(this.data)) return {};
    const errors = this.data["errors"];
    if (!isPlainObject(errors)) return {};
    const out: Record<string, string[]> = {};
    for (const [field, messages] of Object.entries(errors)) {
      if (Array.isArray(messages)) {
        out[field] = messages.filter((m): m is string => typeof m === "string");
      } else if (typeof messages === "string") {
        out[field] = [messages];
      }
    }
    return out;
  }

  get errorsList(): string[] {
    return Object.values(this.errors).flat();
  }

  /** First validation message, else the error message */
  get firstError(): string | null {
    return this.errorsList[0] ?? this.errorMessage;
  }

  /** `message` from the body, else the status text */
  get errorMessage(): string | null {
    if (isPlainObject(this.data)) {
      const message = this.data["message"];
      return typeof message === "string" ? message : null;
    }
    return this.message;
  }

  /** Top-level body value; dotted keys walk nested maps */
  get(key: string): unknown {
    let current: unknown = this.data;
    for (const part of key.split(".")) {
      if (!isPlainObject(current)) return null;
      current = current[part];
    }
    return current ?? null;
  }

  item(): Record<string, unknown> | null {
    return Envelope.item(this.data);
  }

  list(): Record<string, unknown>[] {
    return Envelope.list(this.data);
  }
}
