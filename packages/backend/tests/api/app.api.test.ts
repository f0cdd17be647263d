import request from "supertest";
import { describe, expect, it } from "vitest";
import { app } from "../../src/app.js";

describe("app", () => {
  it("answers unknown routes with a JSON 404", async () => {
    const response = await request(app).get("/api/unknown");

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: "Route not found" });
  });

  it("tags each response with a request id", async () => {
    const echoed = await request(app).get("/api/unknown").set("x-request-id", "req-42");
    expect(echoed.headers["x-request-id"]).toBe("req-42");

    const generated = await request(app).get("/api/unknown");
    expect(generated.headers["x-request-id"]).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("exposes request id and total count headers to browsers", async () => {
    const response = await request(app)
      .options("/api/sessions")
      .set("Origin", "http://localhost:5173")
      .set("Access-Control-Request-Method", "POST");

    const exposed = response.headers["access-control-expose-headers"] ?? "";
    expect(exposed).toBe("x-request-id,x-total-count");
  });

  it("creates sessions without building the classification runtime", async () => {
    const response = await request(app).post("/api/sessions");

    expect(response.status).toBe(201);
    expect(response.body.session.phase).toBe("idle");
  });
});
