// src/middleware/_test_/resolveActor.test.ts

import jwt, { type Algorithm } from "jsonwebtoken";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { UnauthorizedError } from "@/modules/records/record.errors";
import { actorFromToken, type ActorOptions } from "../resolveActor";

const options: ActorOptions = {
  secret: "test-secret",
  algorithm: "HS256",
  optional: false,
  appCode: "app",
  privilegedRole: "superadmin",
};

function sign(payload: object, secret = "test-secret", algorithm: Algorithm = "HS256"): string {
  return jwt.sign(payload, secret, { algorithm });
}

describe("actorFromToken", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  it("maps the token user and this application's roles", () => {
    const token = sign({ user: { username: "alice", roles: { app: ["staff"], other: ["superadmin"] } } });

    expect(actorFromToken(token, options)).toEqual({
      name: "alice",
      roles: ["staff"],
      isPrivileged: false,
    });
  });

  it("accepts roles as a comma-separated string", () => {
    const token = sign({ user: { username: "root", roles: { app: "superadmin, staff" } } });

    expect(actorFromToken(token, options)).toEqual({
      name: "root",
      roles: ["superadmin", "staff"],
      isPrivileged: true,
    });
  });

  it("treats a user without roles as unprivileged", () => {
    const token = sign({ user: { username: "bob" } });

    expect(actorFromToken(token, options)).toEqual({ name: "bob", roles: [], isPrivileged: false });
  });

  it("rejects a token signed with another secret", () => {
    const token = sign({ user: { username: "alice" } }, "other-secret");

    expect(() => actorFromToken(token, options)).toThrow(UnauthorizedError);
  });

  it("rejects a token signed with another algorithm", () => {
    const token = sign({ user: { username: "alice" } }, "test-secret", "HS512");

    expect(() => actorFromToken(token, options)).toThrow(UnauthorizedError);
  });

  it("rejects a payload without a user", () => {
    const token = sign({ sub: "alice" });

    expect(() => actorFromToken(token, options)).toThrow("Unauthorized access.");
  });

  it("rejects every token when no secret is configured", () => {
    const token = sign({ user: { username: "alice" } });

    expect(() => actorFromToken(token, { ...options, secret: null })).toThrow(UnauthorizedError);
  });
});
