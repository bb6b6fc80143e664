/**
 * RemoteResource - the five REST verbs the coordinator uses, keyed by
 * resource name.
 */

import type {KeyValue} from "./plain.js";
import type {ResourceResponse} from "./resource-response.js";

export type FilterValue = string | number | boolean;

export interface RequestOptions {
  headers?: Record<string, string>;
  /** Query parameters, honoured by index only */
  filters?: Record<string, FilterValue>;
}

export interface RemoteResource {
  index(resource: string, opts?: RequestOptions): Promise<ResourceResponse>;
  show(resource: string, id: KeyValue, opts?: RequestOptions): Promise<ResourceResponse>;
  store(resource: string, data: Record<string, unknown>, opts?: RequestOptions): Promise<ResourceResponse>;
  update(resource: string, id: KeyValue, data: Record<string, unknown>, opts?: RequestOptions): Promise<ResourceResponse>;
  destroy(resource: string, id: KeyValue, opts?: RequestOptions): Promise<ResourceResponse>;
}
