/**
 * Remote boundary — transport failures of @tandem/remote-http.
 *
 * HTTP error statuses are not errors here; they come back as responses.
 */

import {TandemError, ErrFacet, NotAvailable} from "@tandem/core";

export const Remote = TandemError.boundary("remote");

/** The request never produced a response (DNS, refused connection, reset) */
export const ErrRequestFailed = Remote.define("request_failed", {
  customProps: ErrFacet.props<{ method: string; url: string }>(),
  facets: [NotAvailable],
  message: (d) => `${d.method} ${d.url} failed`,
});

export const ErrRequestTimedOut = Remote.define("request_timed_out", {
  customProps: ErrFacet.props<{ method: string; url: string; timeoutMs: number }>(),
  facets: [NotAvailable],
  message: (d) => `${d.method} ${d.url} timed out after ${d.timeoutMs}ms`,
});
