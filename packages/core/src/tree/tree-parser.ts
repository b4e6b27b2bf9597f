/**
 * Tree Parser
 *
 * @license Apache-2.0
 *
 * Reconstructs ancestor chains from a depth-prefixed dependency listing
 * (`cargo tree --prefix depth`). The listing is preorder depth-first, so
 * a single stack of crate names is enough to recover every chain.
 */

import { ParseError } from '../errors.js';
import {
  MISSING_PARENT,
  UNKNOWN_VERSION,
  type DependencyOccurrence,
  type TreeLine,
} from '../types.js';

const TREE_LINE = /^(\d+)(.+)$/;
const REVISIT_MARKER = '(*)';

/** Deepest nesting level a listing may use. */
export const MAX_TREE_DEPTH = 1024;

export interface TreeParseOptions {
  /** Profile the listing belongs to; stamped on every occurrence */
  profileId: string;
  /**
   * Reject listings that skip an ancestor level instead of padding the
   * chain with a placeholder.
   */
  strictAncestry?: boolean;
}

export interface TreeParseResult {
  occurrences: DependencyOccurrence[];
  /** Non-blank lines consumed */
  lineCount: number;
}

/**
 * Parse one `<depth><crate> <version>[ (*)]` line.
 */
export function parseTreeLine(raw: string, lineNumber = 1, profileId?: string): TreeLine {
  const match = TREE_LINE.exec(raw.trim());
  if (!match) {
    throw new ParseError('invalid dependency tree line format', lineNumber, raw, profileId);
  }

  const [, depthText = '', rest = ''] = match;
  const tokens = rest
    .trim()
    .split(/\s+/)
    .filter(token => token.length > 0 && token !== REVISIT_MARKER);

  const depth = Number(depthText);
  if (depth > MAX_TREE_DEPTH) {
    throw new ParseError(`depth ${depthText} exceeds the maximum of ${MAX_TREE_DEPTH}`, lineNumber, raw, profileId);
  }

  const [crate, version] = tokens;
  if (crate === undefined || version === undefined) {
    throw new ParseError('missing crate or version in dependency tree line', lineNumber, raw, profileId);
  }

  return {
    depth,
    crate,
    version: version.startsWith('v') ? version : UNKNOWN_VERSION,
  };
}

/**
 * Turn a listing into occurrences, each carrying its own chain snapshot.
 * Any malformed line aborts the whole listing.
 */
export function parseDependencyTree(
  lines: readonly string[],
  options: TreeParseOptions
): TreeParseResult {
  const { profileId, strictAncestry = false } = options;
  const occurrences: DependencyOccurrence[] = [];
  const stack: string[] = [];
  let lineCount = 0;

  lines.forEach((raw, index) => {
    if (raw.trim().length === 0) return;
    lineCount++;

    const lineNumber = index + 1;
    const { depth, crate, version } = parseTreeLine(raw, lineNumber, profileId);

    if (depth === 0) {
      stack.length = 0;
    } else {
      while (stack.length > depth) {
        stack.pop();
      }
      if (stack.length < depth && strictAncestry) {
        throw new ParseError(
          `depth ${depth} skips an ancestor level (${stack.length} known)`,
          lineNumber,
          raw,
          profileId
        );
      }
      while (stack.length < depth) {
        stack.push(MISSING_PARENT);
      }
    }
    stack.push(crate);

    occurrences.push({
      profileId,
      crate,
      version,
      ancestorChain: [...stack],
    });
  });

  return { occurrences, lineCount };
}
