import type { HttpMethod, RouteTable } from "@waymark/router";
import { type CompileOptions, compileRoutes } from "./builder.ts";
import type {
  Guard,
  Handler,
  HandlerBinding,
  RouteDefinition,
  RouteGroupSpec,
  RouteNodeSpec,
} from "./types.ts";

/**
 * Fluent route builder. Produces the same tree as a hand-written
 * {@link RouteGroupSpec}.
 *
 * Guards added with {@link RouterBuilder.guard} cover every route of the
 * builder, including those registered before the call.
 *
 * @example
 * ```typescript
 * const table = createRouter()
 *   .get("/hello", () => "hello")
 *   .group("/users", (users) =>
 *     users
 *       .guard(requireAuth)
 *       .get("/:id", (ctx) => ({ id: ctx.params.id }))
 *       .post("/:id", { guards: [requireAdmin], handler: updateUser }))
 *   .build();
 * ```
 */
export class RouterBuilder {
  private readonly guards: Guard[] = [];
  private readonly routes: RouteNodeSpec[] = [];
  private built = false;

  constructor(private readonly prefix = "") {}

  guard(...guards: Guard[]): this {
    this.assertOpen();
    this.guards.push(...guards);
    return this;
  }

  group(
    prefix: string,
    configure: (group: RouterBuilder) => RouterBuilder | void,
  ): this {
    this.assertOpen();
    const group = new RouterBuilder(prefix);
    configure(group);
    this.routes.push(group.toSpec());
    return this;
  }

  /**
   * Attach a separately built router under `prefix`.
   */
  mount(prefix: string, router: RouterBuilder): this {
    this.assertOpen();
    this.routes.push({ prefix, routes: [router.toSpec()] });
    return this;
  }

  get<TPath extends string>(path: TPath, route: RouteDefinition<TPath>): this {
    return this.on("GET", path, route);
  }

  head<TPath extends string>(path: TPath, route: RouteDefinition<TPath>): this {
    return this.on("HEAD", path, route);
  }

  post<TPath extends string>(path: TPath, route: RouteDefinition<TPath>): this {
    return this.on("POST", path, route);
  }

  put<TPath extends string>(path: TPath, route: RouteDefinition<TPath>): this {
    return this.on("PUT", path, route);
  }

  patch<TPath extends string>(
    path: TPath,
    route: RouteDefinition<TPath>,
  ): this {
    return this.on("PATCH", path, route);
  }

  delete<TPath extends string>(
    path: TPath,
    route: RouteDefinition<TPath>,
  ): this {
    return this.on("DELETE", path, route);
  }

  options<TPath extends string>(
    path: TPath,
    route: RouteDefinition<TPath>,
  ): this {
    return this.on("OPTIONS", path, route);
  }

  on<TPath extends string>(
    method: HttpMethod | readonly HttpMethod[],
    path: TPath,
    route: RouteDefinition<TPath>,
  ): this {
    this.assertOpen();
    if (typeof route === "function") {
      this.routes.push({ method, path, handler: route as Handler });
    } else {
      this.routes.push({
        method,
        path,
        guards: route.guards,
        handler: route.handler as Handler,
      });
    }
    return this;
  }

  toSpec(): RouteGroupSpec {
    return {
      prefix: this.prefix,
      guards: [...this.guards],
      routes: [...this.routes],
    };
  }

  /**
   * Compile into a route table. The builder takes no more routes afterwards.
   */
  build(options?: CompileOptions): RouteTable<HandlerBinding> {
    const table = compileRoutes(this.toSpec(), options);
    this.built = true;
    return table;
  }

  private assertOpen(): void {
    if (this.built) {
      throw new Error("Routes cannot be added after build()");
    }
  }
}

export function createRouter(prefix = ""): RouterBuilder {
  return new RouterBuilder(prefix);
}
