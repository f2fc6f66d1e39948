/**
 * Segment matcher.
 *
 * Each step consumes one decoded segment at a node. Callers try the steps in
 * precedence order: literal, then dynamic, then wildcard.
 */

import type { RouteNode } from "./node.ts";

export interface SegmentStep<T> {
  readonly node: RouteNode<T>;
  /** Parameter name and captured value, absent for literal steps. */
  readonly capture?: readonly [name: string, value: string];
}

export function matchLiteral<T>(
  node: RouteNode<T>,
  segment: string,
): SegmentStep<T> | null {
  const child = node.literals.get(segment);
  return child ? { node: child } : null;
}

/**
 * Dynamic segments never capture an empty string.
 */
export function matchDynamic<T>(
  node: RouteNode<T>,
  segment: string,
): SegmentStep<T> | null {
  const dynamic = node.dynamic;
  if (!dynamic || segment.length === 0) return null;
  return { node: dynamic.node, capture: [dynamic.name, segment] };
}

/**
 * Consumes `segments[index..]` joined with `/`. The remainder must be
 * non-empty, so `/files/` does not reach `/files/*rest`.
 */
export function matchWildcard<T>(
  node: RouteNode<T>,
  segments: readonly string[],
  index: number,
): SegmentStep<T> | null {
  const wildcard = node.wildcard;
  if (!wildcard) return null;

  const rest = index === segments.length - 1
    ? segments[index]
    : segments.slice(index).join("/");
  if (rest.length === 0) return null;

  return { node: wildcard.node, capture: [wildcard.name, rest] };
}

/**
 * Single-step matcher: the next node for one segment under the fixed
 * precedence, without looking further down the tree.
 */
export function matchSegment<T>(
  node: RouteNode<T>,
  segments: readonly string[],
  index: number,
): SegmentStep<T> | null {
  const segment = segments[index];
  return matchLiteral(node, segment) ??
    matchDynamic(node, segment) ??
    matchWildcard(node, segments, index);
}
