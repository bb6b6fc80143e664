/**
 * Platform boundary - configuration loading for @tandem/platform-node.
 */

import {BadInput, ErrFacet, NotFound, TandemError} from "@tandem/core";

export const Platform = TandemError.boundary("platform");

/** The config file is missing or cannot be read */
export const ErrConfigUnreadable = Platform.define("config_unreadable", {
  customProps: ErrFacet.props<{ path: string }>(),
  facets: [NotFound],
  message: (d) => `Cannot read config file ${d.path}`,
});

/** The config is not YAML, or does not match the schema */
export const ErrConfigInvalid = Platform.define("config_invalid", {
  customProps: ErrFacet.props<{ source: string; issues: string }>(),
  facets: [BadInput],
  message: (d) => `Invalid config in ${d.source}: ${d.issues}`,
});
