/**
 * wrapgen detect command - list namespaces third-party detection skips
 */

import {
  detectThirdPartyNamespaces,
  observeNamespaces,
  parseDump,
} from "@wrapgen/frontend";
import type { ResolvedConfig } from "../types.js";

export const detectCommand = (
  config: ResolvedConfig,
  dumpText: string
): readonly string[] =>
  [
    ...detectThirdPartyNamespaces(
      observeNamespaces(parseDump(dumpText)),
      config.generator
    ),
  ].sort();
