/**
 * Radix tree route table.
 *
 * Routes go into a {@link RouteTableBuilder}; {@link RouteTableBuilder.freeze}
 * produces a {@link RouteTable} that can only be matched against.
 */

import { ConflictError } from "./errors.ts";
import {
  createNode,
  freezeNode,
  type MutableNode,
  type RouteNode,
} from "./node.ts";
import {
  encodeLiteral,
  formatPattern,
  parsePattern,
  splitPath,
} from "./path.ts";
import { matchDynamic, matchLiteral, matchWildcard } from "./segment.ts";
import {
  type HttpMethod,
  isHttpMethod,
  type Match,
  type ParamEntries,
  type RouteInfo,
  type SegmentSpec,
} from "./types.ts";

const EMPTY_PARAMS: ParamEntries = Object.freeze([]);
const NOT_FOUND: Match<never> = Object.freeze({ kind: "not-found" });

/**
 * Mutable route table. Only exists while routes are being registered.
 *
 * @example
 * ```typescript
 * const builder = new RouteTableBuilder<string>();
 * builder.insert("/users/:id", "GET", "show-user");
 * const table = builder.freeze();
 *
 * table.match("GET", "/users/42");
 * // { kind: "found", binding: "show-user", pattern: "/users/:id", params: [["id", "42"]] }
 * ```
 */
export class RouteTableBuilder<T> {
  private root: MutableNode<T> = createNode();
  private registered: RouteInfo[] = [];

  /**
   * Bind `binding` to `method` at `pattern`.
   *
   * The whole pattern is checked against the tree before anything is
   * created, so a failed insert leaves the builder untouched.
   *
   * @throws {PatternError} If the pattern is malformed
   * @throws {ConflictError} If a parameter name disagrees with an existing
   * route sharing the prefix, or the method is already bound at the pattern
   */
  insert(pattern: string, method: HttpMethod, binding: T): this {
    const specs = parsePattern(pattern);
    const canonical = formatPattern(specs);

    this.checkConflicts(specs, method, canonical);

    let node = this.root;
    for (const spec of specs) {
      node = this.descendOrCreate(node, spec);
    }

    node.bindings.set(method, binding);
    node.pattern = canonical;
    this.registered.push(Object.freeze({ method, pattern: canonical }));

    return this;
  }

  /**
   * Number of (method, pattern) bindings registered so far.
   */
  get size(): number {
    return this.registered.length;
  }

  /**
   * Snapshot the current routes into an immutable table.
   */
  freeze(): RouteTable<T> {
    return new RouteTable(freezeNode(this.root), [...this.registered]);
  }

  private checkConflicts(
    specs: readonly SegmentSpec[],
    method: HttpMethod,
    pattern: string,
  ): void {
    let node: MutableNode<T> | undefined = this.root;

    for (const spec of specs) {
      if (!node) return;

      switch (spec.type) {
        case "literal":
          node = node.literals.get(spec.value);
          break;
        case "dynamic":
          if (node.dynamic && node.dynamic.name !== spec.name) {
            throw new ConflictError(
              method,
              pattern,
              "parameter-name",
              `parameter ":${spec.name}" conflicts with ":${node.dynamic.name}"`,
            );
          }
          node = node.dynamic?.node;
          break;
        case "wildcard":
          if (node.wildcard && node.wildcard.name !== spec.name) {
            throw new ConflictError(
              method,
              pattern,
              "wildcard-name",
              `wildcard "*${spec.name}" conflicts with "*${node.wildcard.name}"`,
            );
          }
          node = node.wildcard?.node;
          break;
      }
    }

    if (node?.bindings.has(method)) {
      throw new ConflictError(
        method,
        pattern,
        "duplicate-route",
        "route already registered",
      );
    }
  }

  private descendOrCreate(
    node: MutableNode<T>,
    spec: SegmentSpec,
  ): MutableNode<T> {
    switch (spec.type) {
      case "literal": {
        let child = node.literals.get(spec.value);
        if (!child) {
          child = createNode();
          node.literals.set(spec.value, child);
        }
        return child;
      }
      case "dynamic":
        if (!node.dynamic) {
          node.dynamic = { name: spec.name, node: createNode() };
        }
        return node.dynamic.node;
      case "wildcard":
        if (!node.wildcard) {
          node.wildcard = { name: spec.name, node: createNode() };
        }
        return node.wildcard.node;
    }
  }
}

/**
 * Immutable route table. Safe to share between any number of concurrent
 * requests.
 */
export class RouteTable<T> {
  private readonly root: RouteNode<T>;
  private readonly registered: readonly RouteInfo[];
  private readonly staticRoutes: ReadonlyMap<string, RouteNode<T>>;

  constructor(root: RouteNode<T>, registered: RouteInfo[]) {
    this.root = root;
    this.registered = Object.freeze(registered);
    this.staticRoutes = collectStaticRoutes(root);
  }

  /**
   * Resolve `method` and `path` to a binding.
   *
   * `path` is the raw (still percent-encoded) pathname, without query string.
   */
  match(method: string, path: string): Match<T> {
    const staticNode = this.staticRoutes.get(path);
    if (staticNode) {
      const binding = bindingFor(staticNode, method);
      if (binding !== undefined && staticNode.pattern !== null) {
        return {
          kind: "found",
          binding,
          pattern: staticNode.pattern,
          params: EMPTY_PARAMS,
        };
      }
    }

    const split = splitPath(path);
    if (!split.ok) {
      return { kind: "malformed-path", segment: split.segment };
    }

    const walk: Walk<T> = {
      segments: split.segments,
      method,
      captures: [],
      candidate: null,
    };
    const node = resolve(this.root, 0, walk);

    if (node && node.pattern !== null) {
      const binding = bindingFor(node, method);
      if (binding !== undefined) {
        return {
          kind: "found",
          binding,
          pattern: node.pattern,
          params: walk.captures.length === 0
            ? EMPTY_PARAMS
            : Object.freeze(walk.captures),
        };
      }
    }

    if (walk.candidate) {
      return { kind: "method-not-allowed", allowed: walk.candidate.allowed };
    }
    return NOT_FOUND;
  }

  /**
   * Methods bound at the first node, in precedence order, that `path`
   * resolves to. Empty when it resolves to nothing.
   */
  allowedMethods(path: string): readonly HttpMethod[] {
    const split = splitPath(path);
    if (!split.ok) return [];

    const walk: Walk<T> = {
      segments: split.segments,
      method: null,
      captures: [],
      candidate: null,
    };
    resolve(this.root, 0, walk);
    return walk.candidate?.allowed ?? [];
  }

  /**
   * Registered routes in registration order.
   */
  routes(): readonly RouteInfo[] {
    return this.registered;
  }

  get size(): number {
    return this.registered.length;
  }
}

function bindingFor<T>(node: RouteNode<T>, method: string): T | undefined {
  return isHttpMethod(method) ? node.bindings.get(method) : undefined;
}

interface Walk<T> {
  readonly segments: readonly string[];
  /** `null` walks the whole path without ever accepting a node. */
  readonly method: string | null;
  readonly captures: Array<readonly [string, string]>;
  /** First bound node reached that lacks the method. */
  candidate: RouteNode<T> | null;
}

/**
 * Depth-first walk in precedence order. A node that the path ends on but
 * that lacks the method is kept as the 405 candidate (the first one wins)
 * and the next alternative at each level is tried. The first node binding
 * the method is returned.
 */
function resolve<T>(
  node: RouteNode<T>,
  index: number,
  walk: Walk<T>,
): RouteNode<T> | null {
  const { segments, captures } = walk;

  if (index === segments.length) {
    return accept(node, walk) ? node : null;
  }

  const segment = segments[index];

  const literal = matchLiteral(node, segment);
  if (literal) {
    const found = resolve(literal.node, index + 1, walk);
    if (found) return found;
  }

  const dynamic = matchDynamic(node, segment);
  if (dynamic?.capture) {
    captures.push(dynamic.capture);
    const found = resolve(dynamic.node, index + 1, walk);
    if (found) return found;
    captures.pop();
  }

  const wildcard = matchWildcard(node, segments, index);
  if (wildcard?.capture && accept(wildcard.node, walk)) {
    captures.push(wildcard.capture);
    return wildcard.node;
  }

  return null;
}

function accept<T>(node: RouteNode<T>, walk: Walk<T>): boolean {
  if (node.allowed.length === 0) return false;
  if (walk.method !== null && bindingFor(node, walk.method) !== undefined) {
    return true;
  }
  walk.candidate ??= node;
  return false;
}

/**
 * Paths made only of literals, keyed by a raw form that decodes back to
 * exactly those literals.
 */
function collectStaticRoutes<T>(
  root: RouteNode<T>,
): ReadonlyMap<string, RouteNode<T>> {
  const routes = new Map<string, RouteNode<T>>();

  const visit = (node: RouteNode<T>, path: string): void => {
    if (node.allowed.length > 0) {
      routes.set(path || "/", node);
    }
    for (const [segment, child] of node.literals) {
      visit(child, `${path}/${encodeLiteral(segment)}`);
    }
  };

  visit(root, "");
  return routes;
}
