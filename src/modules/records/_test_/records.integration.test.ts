// src/modules/records/_test_/records.integration.test.ts
// HTTP surface end to end: auth, envelopes, language negotiation and the error handler.

import jwt from "jsonwebtoken";
import request from "supertest";
import type { Express } from "express";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "@/app";
import { loadConfig } from "@/lib/config";
import { exampleResource } from "@/modules/example/example.resource";
import { RecordStatus } from "../record.constants";
import { FakeRecordMirror, MemoryRecordStore } from "./memoryRecordStore";
import { exampleRecord, FIXED_STAMP, fixedClock } from "./fixtures";

function bearer(username: string, roles: string[]): string {
  const token = jwt.sign({ user: { username, roles: { app: roles } } }, "test-secret");
  return `Bearer ${token}`;
}

const alice = bearer("alice", ["staff"]);
const root = bearer("root", ["superadmin"]);

describe("records HTTP API", () => {
  let store: MemoryRecordStore;
  let mirror: FakeRecordMirror;
  let app: Express;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);

    store = new MemoryRecordStore();
    mirror = new FakeRecordMirror();
    app = createApp({
      config: loadConfig({ JWT_SECRET: "test-secret", NODE_ENV: "test" }),
      resources: [exampleResource],
      store,
      mirror,
      clock: fixedClock,
      probes: {
        primary: async () => undefined,
        mirror: async () => {
          throw new Error("connection refused");
        },
      },
    });
  });

  ////////////////////////////////////////////////////////////////
  // Service routes
  ////////////////////////////////////////////////////////////////

  describe("service routes", () => {
    it("answers the index without auth", async () => {
      const res = await request(app).get("/");

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        code: 200,
        success: true,
        message: "Record Lifecycle API 1.0.0",
        data: { language: "en", version: "1.0.0" },
      });
    });

    it("reports liveness", async () => {
      const res = await request(app).get("/health");

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ status: "online", mode: "test" });
    });

    it("degrades storage health when a probe fails", async () => {
      const res = await request(app).get("/health/storage");

      expect(res.status).toBe(503);
      expect(res.body).toMatchObject({
        ok: false,
        checks: { primary: "ok", mirror: "unavailable" },
      });
    });

    it("echoes the request id", async () => {
      const res = await request(app).get("/health").set("X-Request-Id", "req-123");

      expect(res.headers["x-request-id"]).toBe("req-123");
    });

    it("answers unknown routes with a translated 404 envelope", async () => {
      const res = await request(app).get("/nope").set("Accept-Language", "id");

      expect(res.status).toBe(404);
      expect(res.headers["content-language"]).toBe("id");
      expect(res.body).toEqual({
        code: 404,
        success: false,
        message: "Rute tidak ditemukan.",
        errors: [],
      });
    });
  });

  ////////////////////////////////////////////////////////////////
  // Authentication
  ////////////////////////////////////////////////////////////////

  describe("authentication", () => {
    it("rejects a request without a token", async () => {
      const res = await request(app).post("/v1/example/create").send({ name: "Item A" });

      expect(res.status).toBe(401);
      expect(res.headers["www-authenticate"]).toBe("Bearer");
      expect(res.body).toEqual({
        code: 401,
        success: false,
        message: "Unauthorized access.",
        errors: [],
      });
    });

    it("rejects a malformed Authorization header", async () => {
      const res = await request(app)
        .post("/v1/example/create")
        .set("Authorization", "Token abc")
        .send({ name: "Item A" });

      expect(res.status).toBe(401);
    });

    it("serves the index under a resource once authenticated", async () => {
      const res = await request(app).get("/v1/example/").set("Authorization", alice);

      expect(res.status).toBe(200);
      expect(res.body.message).toBe("Record Lifecycle API 1.0.0");
    });
  });

  ////////////////////////////////////////////////////////////////
  // Lifecycle
  ////////////////////////////////////////////////////////////////

  describe("lifecycle", () => {
    it("creates, updates and deletes a record", async () => {
      const created = await request(app)
        .post("/v1/example/create")
        .set("Authorization", alice)
        .send({ name: "Item A", detail: { description: "first" } });

      expect(created.status).toBe(200);
      expect(created.body).toMatchObject({
        code: 200,
        success: true,
        message: "Data has been saved successfully.",
        data: {
          id: 1,
          name: "Item A",
          status: RecordStatus.DRAFT,
          lockVersion: 1,
          detail: { description: "first", changeLog: { createdAt: FIXED_STAMP, createdBy: "alice" } },
        },
      });

      const updated = await request(app)
        .put("/v1/example/update")
        .set("Authorization", alice)
        .send({ id: 1, lockVersion: 1, status: RecordStatus.INACTIVE });

      expect(updated.status).toBe(200);
      expect(updated.body.data).toMatchObject({ status: RecordStatus.INACTIVE, lockVersion: 2 });

      const deleted = await request(app)
        .delete("/v1/example/delete")
        .set("Authorization", root)
        .send({ id: 1, lockVersion: 2 });

      expect(deleted.status).toBe(200);
      expect(deleted.body.message).toBe("Data has been deleted successfully.");
      expect(deleted.body.data).toMatchObject({
        status: RecordStatus.DELETED,
        lockVersion: 3,
        detail: { changeLog: { deletedAt: FIXED_STAMP, deletedBy: "root" } },
      });
      expect(mirror.documents.get("example")).toHaveLength(1);
    });

    it("answers a stale write with 409", async () => {
      store.seed(exampleResource, exampleRecord({ lockVersion: 3 }));

      const res = await request(app)
        .put("/v1/example/update")
        .set("Authorization", alice)
        .send({ id: 1, lockVersion: 2, name: "B" });

      expect(res.status).toBe(409);
      expect(res.body).toEqual({
        code: 409,
        success: false,
        message: "The data being updated is outdated. Please refresh and try again.",
        errors: [],
      });
    });

    it("answers validation failures with 422 and field errors", async () => {
      const res = await request(app)
        .post("/v1/example/create")
        .set("Authorization", alice)
        .send({ name: "" });

      expect(res.status).toBe(422);
      expect(res.body).toEqual({
        code: 422,
        success: false,
        message: "Field validation failed.",
        errors: [{ field: "name", message: "Name cannot be blank." }],
      });
    });

    it("translates errors for the negotiated language", async () => {
      const res = await request(app)
        .post("/v1/example/view?id=42")
        .set("Authorization", alice)
        .set("Accept-Language", "id-ID,id;q=0.9");

      expect(res.status).toBe(404);
      expect(res.body.message).toBe("Data tidak ditemukan.");
    });

    it("reads parameters from the query string when no body is sent", async () => {
      store.seed(exampleResource, exampleRecord());

      const res = await request(app).post("/v1/example/view?id=1").set("Authorization", alice);

      expect(res.status).toBe(200);
      expect(res.body.data).toMatchObject({ id: 1, name: "Item A" });
    });

    it("answers a malformed JSON body with 400", async () => {
      const res = await request(app)
        .post("/v1/example/create")
        .set("Authorization", alice)
        .set("Content-Type", "application/json")
        .send("{bad");

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        code: 400,
        success: false,
        message: "Bad request.",
        errors: [],
      });
    });

    it("hides unexpected failures behind a generic 500", async () => {
      vi.spyOn(store, "findById").mockRejectedValueOnce(new Error("db down"));

      const res = await request(app)
        .post("/v1/example/view")
        .set("Authorization", alice)
        .send({ id: 1 });

      expect(res.status).toBe(500);
      expect(res.body).toMatchObject({
        code: 500,
        success: false,
        message: "An exception has occurred.",
        errors: [],
        traceForDev: { exception: "Error" },
      });
    });
  });

  ////////////////////////////////////////////////////////////////
  // Search
  ////////////////////////////////////////////////////////////////

  describe("search", () => {
    beforeEach(() => {
      store.seed(exampleResource, exampleRecord({ id: 1, name: "John Doe" }));
      store.seed(exampleResource, exampleRecord({ id: 2, name: "Jane Roe" }));
    });

    it("lists from the primary store", async () => {
      const res = await request(app)
        .post("/v1/example/data")
        .set("Authorization", alice)
        .send({ name: "john doe" });

      expect(res.status).toBe(200);
      expect(res.body.pagination).toEqual({ page: 1, pageSize: 1, totalCount: 1, display: 1 });
      expect(res.body.data).toMatchObject([{ id: 1, name: "John Doe" }]);
    });

    it("lists from the mirror", async () => {
      mirror.seed("example", { id: 1, name: "John Doe", status: 2, lockVersion: 1, detail: {} });
      mirror.seed("example", { id: 2, name: "Jane Roe", status: 2, lockVersion: 1, detail: {} });

      const res = await request(app)
        .post("/v1/example/list")
        .set("Authorization", alice)
        .send({ name: "jane" });

      expect(res.status).toBe(200);
      expect(res.body.data).toEqual([{ id: 2, name: "Jane Roe", status: 2, lockVersion: 1, detail: {} }]);
      expect(mirror.finds[0]?.filter).toEqual({
        $and: [{ name: { $regex: "jane", $options: "i" } }, { status: { $ne: 4 } }],
      });
    });

    it("rejects unknown search fields", async () => {
      const res = await request(app)
        .post("/v1/example/data")
        .set("Authorization", alice)
        .send({ color: "red" });

      expect(res.status).toBe(422);
      expect(res.body.errors).toEqual([
        { field: "color", message: "Field color is not a valid request parameter." },
      ]);
    });
  });
});
