/**
 * @tandem/remote-http - REST resource client over fetch
 */

export { HttpResourceClient } from "./http-resource.js";
export type { HttpResourceClientOptions, HttpRequest, HttpMethod, Interceptor, FetchFn } from "./http-resource.js";

// Errors
export { Remote, ErrRequestFailed, ErrRequestTimedOut } from "./errors.js";
