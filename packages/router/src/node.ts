/**
 * Radix tree nodes: a mutable shape used while routes are inserted, and a
 * frozen shape that the route table matches against.
 */

import { HTTP_METHODS, type HttpMethod } from "./types.ts";

export interface MutableNode<T> {
  literals: Map<string, MutableNode<T>>;
  dynamic: MutableParamChild<T> | null;
  wildcard: MutableParamChild<T> | null;
  bindings: Map<HttpMethod, T>;
  pattern: string | null;
}

export interface MutableParamChild<T> {
  name: string;
  node: MutableNode<T>;
}

export interface RouteNode<T> {
  readonly literals: ReadonlyMap<string, RouteNode<T>>;
  readonly dynamic: ParamChild<T> | null;
  readonly wildcard: ParamChild<T> | null;
  readonly bindings: ReadonlyMap<HttpMethod, T>;
  /** Methods bound here, in canonical order. */
  readonly allowed: readonly HttpMethod[];
  /** Pattern of the routes bound here, `null` for pass-through nodes. */
  readonly pattern: string | null;
}

export interface ParamChild<T> {
  readonly name: string;
  readonly node: RouteNode<T>;
}

export function createNode<T>(): MutableNode<T> {
  return {
    literals: new Map(),
    dynamic: null,
    wildcard: null,
    bindings: new Map(),
    pattern: null,
  };
}

/**
 * Deep-copy a mutable subtree into frozen nodes. The copy shares nothing
 * mutable with its source.
 */
export function freezeNode<T>(node: MutableNode<T>): RouteNode<T> {
  const literals = new Map<string, RouteNode<T>>();
  for (const [segment, child] of node.literals) {
    literals.set(segment, freezeNode(child));
  }

  const allowed = HTTP_METHODS.filter((method) => node.bindings.has(method));

  return Object.freeze({
    literals,
    dynamic: node.dynamic ? freezeParamChild(node.dynamic) : null,
    wildcard: node.wildcard ? freezeParamChild(node.wildcard) : null,
    bindings: new Map(node.bindings),
    allowed: Object.freeze(allowed),
    pattern: node.pattern,
  });
}

function freezeParamChild<T>(child: MutableParamChild<T>): ParamChild<T> {
  return Object.freeze({ name: child.name, node: freezeNode(child.node) });
}
