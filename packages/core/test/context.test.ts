import { describe, expect, it } from "vitest";
import { Context } from "../src/context/mod.ts";

describe("Context", () => {
  describe("constructor", () => {
    it("should create context with request", () => {
      const request = new Request("http://localhost:8000/users/123");
      const ctx = new Context(request);

      expect(ctx.method).toBe("GET");
      expect(ctx.path).toBe("/users/123");
      expect(ctx.request).toBe(request);
      expect(ctx.pattern).toBe("");
      expect(ctx.paramEntries).toEqual([]);
    });

    it("should expose params as object and ordered pairs", () => {
      const ctx = new Context(
        new Request("http://localhost:8000/orgs/o1/repos/r2"),
        {
          params: [["org", "o1"], ["repo", "r2"]],
          pattern: "/orgs/:org/repos/:repo",
        },
      );

      expect(ctx.params.org).toBe("o1");
      expect(ctx.params.repo).toBe("r2");
      expect(ctx.paramEntries).toEqual([["org", "o1"], ["repo", "r2"]]);
      expect(ctx.pattern).toBe("/orgs/:org/repos/:repo");
    });

    it("should freeze params", () => {
      const ctx = new Context(new Request("http://localhost:8000/users/1"), {
        params: [["id", "1"]],
      });

      expect(Object.isFrozen(ctx.params)).toBe(true);
    });

    it("should prefer the given pathname", () => {
      const ctx = new Context(new Request("http://localhost:8000/a/b"), {
        pathname: "/mounted",
      });

      expect(ctx.path).toBe("/mounted");
    });
  });

  describe("URL access", () => {
    it("should handle URL with query string", () => {
      const ctx = new Context(
        new Request("http://localhost:8000/search?q=routing&limit=10"),
      );

      expect(ctx.path).toBe("/search");
      expect(ctx.query.get("q")).toBe("routing");
      expect(ctx.query.get("limit")).toBe("10");
    });

    it("should parse the URL once", () => {
      const ctx = new Context(new Request("http://localhost:8000/a?x=1"));

      expect(ctx.url).toBe(ctx.url);
      expect(ctx.query).toBe(ctx.query);
    });

    it("should handle URL with hash", () => {
      const ctx = new Context(new Request("http://localhost:8000/page#section"));

      expect(ctx.path).toBe("/page");
    });
  });

  describe("state", () => {
    it("should start empty and accept values", () => {
      const ctx = new Context(new Request("http://localhost:8000/"));

      expect(Object.keys(ctx.state)).toEqual([]);
      ctx.state.user = { id: 1 };
      expect(ctx.state.user).toEqual({ id: 1 });
    });

    it("should not share state between contexts", () => {
      const first = new Context(new Request("http://localhost:8000/"));
      const second = new Context(new Request("http://localhost:8000/"));

      first.state.user = "alice";

      expect(second.state.user).toBeUndefined();
    });
  });

  describe("body()", () => {
    it("should read the body once", async () => {
      const ctx = new Context(
        new Request("http://localhost:8000/", { method: "POST", body: "hi" }),
      );

      const first = await ctx.body();
      const second = await ctx.body();

      expect(new TextDecoder().decode(first)).toBe("hi");
      expect(second).toBe(first);
      expect(ctx.request.bodyUsed).toBe(true);
    });
  });

  describe("response helpers", () => {
    const ctx = new Context(new Request("http://localhost:8000/"));

    it("should create JSON response", async () => {
      const response = ctx.json({ message: "hello" }, 201);

      expect(response.status).toBe(201);
      expect(response.headers.get("Content-Type")).toContain(
        "application/json",
      );
      expect(await response.json()).toEqual({ message: "hello" });
    });

    it("should create text response", async () => {
      const response = ctx.text("Hello");

      expect(response.headers.get("Content-Type")).toBe(
        "text/plain; charset=utf-8",
      );
      expect(await response.text()).toBe("Hello");
    });

    it("should create no-content response", () => {
      expect(ctx.noContent().status).toBe(204);
    });

    it("should create error responses shaped like thrown errors", async () => {
      const response = ctx.unauthorized();

      expect(response.status).toBe(401);
      expect(response.headers.get("Content-Type")).toBe(
        "application/json; charset=utf-8",
      );
      expect(await response.json()).toEqual({
        error: { message: "Unauthorized", code: "UNAUTHORIZED", status: 401 },
      });
      expect(ctx.notFound().status).toBe(404);
      expect(ctx.badRequest().status).toBe(400);
    });

    it("should use the given message in error responses", async () => {
      const response = ctx.forbidden("Nope");

      expect(response.status).toBe(403);
      expect(await response.json()).toEqual({
        error: { message: "Nope", code: "FORBIDDEN", status: 403 },
      });
    });
  });
});
