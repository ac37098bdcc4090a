import express, { type Request, type Response } from "express";
import jwt from "jsonwebtoken";
import { describe, expect, it, vi } from "vitest";
import { COOKIE_NAME, createAuthMiddleware, TokenAuthority, TOKEN_TTL_SECONDS } from "../auth.js";
import { ServiceError } from "../errors.js";
import { T0 } from "./helpers.js";

const SECRET = "test-secret";

function fakeRequest(url: string, headers: Request["headers"] = {}): Request {
  const req: Request = Object.create(express.request);
  req.url = url;
  req.method = "GET";
  req.headers = headers;
  return req;
}

const res: Response = Object.create(express.response);

describe("TokenAuthority", () => {
  const authority = new TokenAuthority(SECRET, () => T0);

  it("round-trips the user id", () => {
    const token = authority.issue("user-1", "ada@example.com");
    expect(authority.validate(token)).toBe("user-1");
  });

  it("puts the email and a 24 hour expiry in the claims", () => {
    const claims = jwt.decode(authority.issue("user-1", "ada@example.com"));
    expect(claims).toEqual({
      sub: "user-1",
      email: "ada@example.com",
      iat: T0 / 1000,
      exp: T0 / 1000 + TOKEN_TTL_SECONDS,
    });
  });

  it("rejects a token once it has expired", () => {
    const token = authority.issue("user-1", "ada@example.com");
    const later = new TokenAuthority(SECRET, () => T0 + (TOKEN_TTL_SECONDS + 1) * 1000);
    expect(() => later.validate(token)).toThrow("invalid or expired token");
  });

  it("rejects tokens signed with another secret or algorithm", () => {
    const otherSecret = new TokenAuthority("other-secret", () => T0).issue("user-1", "a@b.co");
    const hs512 = jwt.sign({ sub: "user-1" }, SECRET, { algorithm: "HS512" });

    expect(() => authority.validate(otherSecret)).toThrow("invalid or expired token");
    expect(() => authority.validate(hs512)).toThrow("invalid or expired token");
  });

  it("requires a subject claim", () => {
    const token = jwt.sign({ email: "ada@example.com" }, SECRET, { algorithm: "HS256" });
    expect(() => authority.validate(token)).toThrow("invalid token: missing or invalid user ID");
  });

  it("rejects an empty token and an empty secret", () => {
    expect(() => authority.validate("")).toThrow("token is required");
    expect(() => new TokenAuthority("")).toThrow();
  });
});

describe("auth middleware", () => {
  const authority = new TokenAuthority(SECRET);
  const middleware = createAuthMiddleware(authority);
  const token = authority.issue("user-1", "ada@example.com");

  it("lets public paths through without a token", () => {
    const req = fakeRequest("/login");
    const next = vi.fn();
    middleware(req, res, next);
    expect(next).toHaveBeenCalledWith();
    expect(req.userId).toBeUndefined();
  });

  it("reads a Bearer token", () => {
    const req = fakeRequest("/board/b1", { authorization: `Bearer ${token}` });
    const next = vi.fn();
    middleware(req, res, next);
    expect(next).toHaveBeenCalledWith();
    expect(req.userId).toBe("user-1");
  });

  it("prefers the auth cookie", () => {
    const other = authority.issue("user-2", "grace@example.com");
    const req = fakeRequest("/board/b1", {
      cookie: `${COOKIE_NAME}=${other}`,
      authorization: `Bearer ${token}`,
    });
    const next = vi.fn();
    middleware(req, res, next);
    expect(req.userId).toBe("user-2");
  });

  it("falls back to the Bearer token when the cookie is stale", () => {
    const stale = new TokenAuthority(SECRET, () => Date.now() - 2 * TOKEN_TTL_SECONDS * 1000).issue(
      "user-2",
      "grace@example.com"
    );
    const req = fakeRequest("/me", {
      cookie: `${COOKIE_NAME}=${stale}`,
      authorization: `Bearer ${token}`,
    });
    const next = vi.fn();
    middleware(req, res, next);
    expect(next).toHaveBeenCalledWith();
    expect(req.userId).toBe("user-1");
  });

  it("reports the failure when neither the cookie nor the Bearer token is valid", () => {
    const req = fakeRequest("/me", {
      cookie: `${COOKIE_NAME}=stale`,
      authorization: "Bearer also-stale",
    });
    const next = vi.fn();
    middleware(req, res, next);

    const [err] = next.mock.calls[0];
    expect(err).toMatchObject({ code: "Unauthenticated", message: "invalid or expired token" });
    expect(req.userId).toBeUndefined();
  });

  it("passes Unauthenticated on when no valid token is present", () => {
    for (const headers of [{}, { authorization: "Bearer not-a-jwt" }]) {
      const next = vi.fn();
      middleware(fakeRequest("/board/b1", headers), res, next);

      const [err] = next.mock.calls[0];
      expect(err).toBeInstanceOf(ServiceError);
      expect(err).toMatchObject({ code: "Unauthenticated" });
    }
  });
});
