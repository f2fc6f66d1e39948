import { describe, expect, it } from "vitest";
import { ConflictError, PatternError } from "../src/errors.ts";
import { RouteTableBuilder } from "../src/radix.ts";

describe("RouteTableBuilder", () => {
  describe("insert()", () => {
    it("should register static route", () => {
      const table = new RouteTableBuilder<string>()
        .insert("/users", "GET", "list")
        .freeze();

      expect(table.match("GET", "/users")).toEqual({
        kind: "found",
        binding: "list",
        pattern: "/users",
        params: [],
      });
    });

    it("should register route with single parameter", () => {
      const table = new RouteTableBuilder<string>()
        .insert("/users/:id", "GET", "show")
        .freeze();

      expect(table.match("GET", "/users/123")).toEqual({
        kind: "found",
        binding: "show",
        pattern: "/users/:id",
        params: [["id", "123"]],
      });
    });

    it("should keep parameters in path order", () => {
      const table = new RouteTableBuilder<string>()
        .insert("/orgs/:orgId/teams/:teamId/members/:memberId", "GET", "m")
        .freeze();

      const match = table.match("GET", "/orgs/o1/teams/t2/members/m3");
      expect(match.kind).toBe("found");
      if (match.kind !== "found") return;
      expect(match.params).toEqual([
        ["orgId", "o1"],
        ["teamId", "t2"],
        ["memberId", "m3"],
      ]);
    });

    it("should allow same path for different methods", () => {
      const table = new RouteTableBuilder<string>()
        .insert("/users", "GET", "list")
        .insert("/users", "POST", "create")
        .freeze();

      const get = table.match("GET", "/users");
      const post = table.match("POST", "/users");
      expect(get.kind === "found" && get.binding).toBe("list");
      expect(post.kind === "found" && post.binding).toBe("create");
    });

    it("should throw on duplicate route registration", () => {
      const builder = new RouteTableBuilder<string>();
      builder.insert("/users", "GET", "first");

      expect(() => builder.insert("/users", "GET", "second")).toThrow(
        ConflictError,
      );
      expect(() => builder.insert("/users", "GET", "second")).toThrow(
        "GET /users: route already registered",
      );
    });

    it("should report the conflict reason", () => {
      const builder = new RouteTableBuilder<string>()
        .insert("/users/:id", "GET", "a");

      try {
        builder.insert("/users/:userId/posts", "GET", "b");
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConflictError);
        if (!(error instanceof ConflictError)) return;
        expect(error.reason).toBe("parameter-name");
        expect(error.method).toBe("GET");
        expect(error.pattern).toBe("/users/:userId/posts");
        expect(error.message).toBe(
          'GET /users/:userId/posts: parameter ":userId" conflicts with ":id"',
        );
      }
    });

    it("should reject inconsistent parameter names across methods", () => {
      const builder = new RouteTableBuilder<string>()
        .insert("/users/:id", "GET", "a");

      expect(() => builder.insert("/users/:key", "DELETE", "b")).toThrow(
        ConflictError,
      );
    });

    it("should reject inconsistent wildcard names", () => {
      const builder = new RouteTableBuilder<string>()
        .insert("/files/*path", "GET", "a");

      expect(() => builder.insert("/files/*rest", "POST", "b")).toThrow(
        'POST /files/*rest: wildcard "*rest" conflicts with "*path"',
      );
    });

    it("should leave the table unchanged after a failed insert", () => {
      const builder = new RouteTableBuilder<string>()
        .insert("/users/:id", "GET", "show");

      expect(() =>
        builder.insert("/users/:userId/posts/:postId", "GET", "post")
      ).toThrow(ConflictError);
      expect(() => builder.insert("/users/:id", "GET", "again")).toThrow(
        ConflictError,
      );

      const table = builder.freeze();
      expect(table.size).toBe(1);
      expect(table.routes()).toEqual([
        { method: "GET", pattern: "/users/:id" },
      ]);
      expect(table.match("GET", "/users/7/posts/1")).toEqual({
        kind: "not-found",
      });
      const match = table.match("GET", "/users/7");
      expect(match.kind === "found" && match.binding).toBe("show");
    });

    it("should throw on path not starting with /", () => {
      const builder = new RouteTableBuilder<string>();

      expect(() => builder.insert("users", "GET", "x")).toThrow(PatternError);
      expect(() => builder.insert("users", "GET", "x")).toThrow(
        'Invalid route pattern "users": must start with /',
      );
      expect(builder.size).toBe(0);
    });

    it("should reject a wildcard before the last segment", () => {
      const builder = new RouteTableBuilder<string>();

      expect(() => builder.insert("/files/*rest/meta", "GET", "x")).toThrow(
        'Invalid route pattern "/files/*rest/meta": wildcard "*rest" must be the last segment',
      );
    });
  });

  describe("freeze()", () => {
    it("should not see routes inserted after freezing", () => {
      const builder = new RouteTableBuilder<string>()
        .insert("/a", "GET", "a");
      const table = builder.freeze();

      builder.insert("/b", "GET", "b");

      expect(table.match("GET", "/b")).toEqual({ kind: "not-found" });
      expect(builder.freeze().match("GET", "/b").kind).toBe("found");
    });
  });
});

describe("RouteTable", () => {
  describe("match()", () => {
    it("should return not-found for non-existent route", () => {
      const table = new RouteTableBuilder<string>().freeze();

      expect(table.match("GET", "/nonexistent")).toEqual({
        kind: "not-found",
      });
    });

    it("should match exact static routes only", () => {
      const table = new RouteTableBuilder<string>()
        .insert("/users", "GET", "list")
        .freeze();

      expect(table.match("GET", "/users").kind).toBe("found");
      expect(table.match("GET", "/users/123").kind).toBe("not-found");
      expect(table.match("GET", "/user").kind).toBe("not-found");
      expect(table.match("GET", "/users/").kind).toBe("not-found");
    });

    it("should match the root pattern without descending", () => {
      const table = new RouteTableBuilder<string>()
        .insert("/", "GET", "root")
        .insert("/:page", "GET", "page")
        .freeze();

      expect(table.match("GET", "/")).toEqual({
        kind: "found",
        binding: "root",
        pattern: "/",
        params: [],
      });
    });

    it("should prefer literal over dynamic segments", () => {
      const table = new RouteTableBuilder<string>()
        .insert("/users/:id", "GET", "user")
        .insert("/users/me", "GET", "me")
        .freeze();

      expect(table.match("GET", "/users/me")).toEqual({
        kind: "found",
        binding: "me",
        pattern: "/users/me",
        params: [],
      });
      expect(table.match("GET", "/users/42")).toEqual({
        kind: "found",
        binding: "user",
        pattern: "/users/:id",
        params: [["id", "42"]],
      });
    });

    it("should prefer dynamic over wildcard segments", () => {
      const table = new RouteTableBuilder<string>()
        .insert("/files/*rest", "GET", "tree")
        .insert("/files/:name", "GET", "file")
        .freeze();

      const single = table.match("GET", "/files/readme.md");
      expect(single.kind === "found" && single.binding).toBe("file");

      const nested = table.match("GET", "/files/docs/readme.md");
      expect(nested).toEqual({
        kind: "found",
        binding: "tree",
        pattern: "/files/*rest",
        params: [["rest", "docs/readme.md"]],
      });
    });

    it("should let the wildcard consume the remainder", () => {
      const table = new RouteTableBuilder<string>()
        .insert("/files/*rest", "GET", "files")
        .freeze();

      expect(table.match("GET", "/files/a/b/c")).toEqual({
        kind: "found",
        binding: "files",
        pattern: "/files/*rest",
        params: [["rest", "a/b/c"]],
      });
    });

    it("should not match a wildcard against an empty remainder", () => {
      const table = new RouteTableBuilder<string>()
        .insert("/files/*rest", "GET", "files")
        .freeze();

      expect(table.match("GET", "/files").kind).toBe("not-found");
      expect(table.match("GET", "/files/").kind).toBe("not-found");
    });

    it("should name a bare wildcard *", () => {
      const table = new RouteTableBuilder<string>()
        .insert("/assets/*", "GET", "assets")
        .freeze();

      expect(table.match("GET", "/assets/css/site.css")).toEqual({
        kind: "found",
        binding: "assets",
        pattern: "/assets/*",
        params: [["*", "css/site.css"]],
      });
    });

    it("should not capture an empty dynamic segment", () => {
      const table = new RouteTableBuilder<string>()
        .insert("/users/:id/posts", "GET", "posts")
        .freeze();

      expect(table.match("GET", "/users//posts").kind).toBe("not-found");
    });

    it("should fall back to the dynamic branch when the literal branch is a dead end", () => {
      const table = new RouteTableBuilder<string>()
        .insert("/users/me/settings", "GET", "settings")
        .insert("/users/:id/posts", "GET", "posts")
        .freeze();

      expect(table.match("GET", "/users/me/posts")).toEqual({
        kind: "found",
        binding: "posts",
        pattern: "/users/:id/posts",
        params: [["id", "me"]],
      });
    });

    it("should fall through to the dynamic route when the literal lacks the method", () => {
      const table = new RouteTableBuilder<string>()
        .insert("/users/me", "GET", "me")
        .insert("/users/:id", "DELETE", "remove")
        .freeze();

      expect(table.match("DELETE", "/users/me")).toEqual({
        kind: "found",
        binding: "remove",
        pattern: "/users/:id",
        params: [["id", "me"]],
      });
      expect(table.match("GET", "/users/me")).toEqual({
        kind: "found",
        binding: "me",
        pattern: "/users/me",
        params: [],
      });
    });

    it("should fall through to the wildcard route when no earlier branch has the method", () => {
      const table = new RouteTableBuilder<string>()
        .insert("/files/readme", "GET", "readme")
        .insert("/files/:name", "PUT", "upload")
        .insert("/files/*path", "DELETE", "remove")
        .freeze();

      expect(table.match("DELETE", "/files/readme")).toEqual({
        kind: "found",
        binding: "remove",
        pattern: "/files/*path",
        params: [["path", "readme"]],
      });
    });

    it("should answer 405 with the literal node's methods when no branch has the method", () => {
      const table = new RouteTableBuilder<string>()
        .insert("/users/me", "GET", "me")
        .insert("/users/:id", "DELETE", "remove")
        .freeze();

      expect(table.match("POST", "/users/me")).toEqual({
        kind: "method-not-allowed",
        allowed: ["GET"],
      });
      expect(table.allowedMethods("/users/me")).toEqual(["GET"]);
    });

    it("should report the methods registered at the pattern", () => {
      const table = new RouteTableBuilder<string>()
        .insert("/users/:id", "POST", "update")
        .insert("/users/:id", "GET", "show")
        .insert("/users", "PUT", "replace")
        .freeze();

      expect(table.match("DELETE", "/users/7")).toEqual({
        kind: "method-not-allowed",
        allowed: ["GET", "POST"],
      });
    });

    it("should treat unknown method tokens as not allowed", () => {
      const table = new RouteTableBuilder<string>()
        .insert("/users", "GET", "list")
        .freeze();

      expect(table.match("PROPFIND", "/users")).toEqual({
        kind: "method-not-allowed",
        allowed: ["GET"],
      });
    });

    it("should decode percent-encoded segments", () => {
      const table = new RouteTableBuilder<string>()
        .insert("/café/:name", "GET", "menu")
        .freeze();

      expect(table.match("GET", "/caf%C3%A9/cr%C3%A8me%20br%C3%BBl%C3%A9e"))
        .toEqual({
          kind: "found",
          binding: "menu",
          pattern: "/café/:name",
          params: [["name", "crème brûlée"]],
        });
    });

    it("should match literals registered with percent-encoding", () => {
      const table = new RouteTableBuilder<string>()
        .insert("/100%25", "GET", "percent")
        .insert("/a%2Fb", "GET", "slash")
        .freeze();

      expect(table.match("GET", "/100%25")).toEqual({
        kind: "found",
        binding: "percent",
        pattern: "/100%25",
        params: [],
      });
      expect(table.match("GET", "/a%2Fb").kind).toBe("found");
      expect(table.match("GET", "/100%")).toEqual({
        kind: "malformed-path",
        segment: "100%",
      });
    });

    it("should treat encoded and plain literals as the same route", () => {
      const builder = new RouteTableBuilder<string>().insert(
        "/caf%C3%A9",
        "GET",
        "encoded",
      );

      expect(() => builder.insert("/café", "GET", "plain")).toThrow(
        "GET /café: route already registered",
      );
    });

    it("should report malformed percent-encoding", () => {
      const table = new RouteTableBuilder<string>()
        .insert("/users/:id", "GET", "show")
        .freeze();

      expect(table.match("GET", "/users/%E0%A4%A")).toEqual({
        kind: "malformed-path",
        segment: "%E0%A4%A",
      });
    });

    it("should return identical results for identical lookups", () => {
      const table = new RouteTableBuilder<string>()
        .insert("/users/:id", "GET", "show")
        .insert("/users", "GET", "list")
        .freeze();

      for (const path of ["/users", "/users/9", "/nope"]) {
        expect(table.match("GET", path)).toEqual(table.match("GET", path));
        expect(table.match("PUT", path)).toEqual(table.match("PUT", path));
      }
    });

    it("should not return bindings of disjoint patterns", () => {
      const table = new RouteTableBuilder<string>()
        .insert("/a/:x/c", "GET", "acx")
        .insert("/a/b/d", "GET", "abd")
        .insert("/b/*rest", "GET", "brest")
        .freeze();

      const abc = table.match("GET", "/a/b/c");
      expect(abc.kind === "found" && abc.binding).toBe("acx");
      const abd = table.match("GET", "/a/b/d");
      expect(abd.kind === "found" && abd.binding).toBe("abd");
      expect(table.match("GET", "/a/b").kind).toBe("not-found");
      expect(table.match("GET", "/c/b/d").kind).toBe("not-found");
    });
  });

  describe("allowedMethods()", () => {
    it("should list methods at the resolved node", () => {
      const table = new RouteTableBuilder<string>()
        .insert("/items/:id", "PATCH", "p")
        .insert("/items/:id", "GET", "g")
        .freeze();

      expect(table.allowedMethods("/items/3")).toEqual(["GET", "PATCH"]);
      expect(table.allowedMethods("/items")).toEqual([]);
    });
  });

  describe("routes()", () => {
    it("should list routes in registration order", () => {
      const table = new RouteTableBuilder<string>()
        .insert("/b", "POST", "1")
        .insert("/a/:id", "GET", "2")
        .insert("/*", "GET", "3")
        .freeze();

      expect(table.routes()).toEqual([
        { method: "POST", pattern: "/b" },
        { method: "GET", pattern: "/a/:id" },
        { method: "GET", pattern: "/*" },
      ]);
    });
  });
});
