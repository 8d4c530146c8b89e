import { describe, it, expect } from "vitest";
import request from "supertest";
import { TEST_SECRET, createTestApp } from "../test/helpers";
import { signToken } from "./_ensureAuth";

const signup = { username: "meena", password: "secret1", confirm_password: "secret1" };

describe("auth routes", () => {
  it("signs up, logs in and reads the profile", async () => {
    const { app } = createTestApp();

    const created = await request(app).post("/api/auth/signup").send(signup);
    expect(created.status).toBe(201);
    expect(created.body.user).toEqual({
      id: "1",
      username: "meena",
      created_at: "2026-01-01T00:00:00.000Z",
    });
    expect(typeof created.body.token).toBe("string");

    const login = await request(app)
      .post("/api/auth/login")
      .send({ username: "Meena", password: "secret1" });
    expect(login.status).toBe(200);
    expect(login.body.user.username).toBe("meena");

    const me = await request(app)
      .get("/api/auth/me")
      .set("Authorization", `Bearer ${login.body.token}`);
    expect(me.status).toBe(200);
    expect(me.body.user.id).toBe("1");
  });

  it("refuses a username that differs only by case", async () => {
    const { app } = createTestApp();
    await request(app).post("/api/auth/signup").send(signup);

    const dup = await request(app)
      .post("/api/auth/signup")
      .send({ ...signup, username: "MEENA" });
    expect(dup.status).toBe(409);
    expect(dup.body.error).toBe("username_taken");
  });

  it("validates the signup form", async () => {
    const { app } = createTestApp();

    const short = await request(app)
      .post("/api/auth/signup")
      .send({ ...signup, username: "ab" });
    expect(short.status).toBe(400);
    expect(short.body).toEqual({
      error: "invalid_username",
      message: "Username must be at least 3 characters.",
    });

    const weak = await request(app)
      .post("/api/auth/signup")
      .send({ ...signup, password: "123", confirm_password: "123" });
    expect(weak.body.error).toBe("invalid_password");

    const mismatch = await request(app)
      .post("/api/auth/signup")
      .send({ ...signup, confirm_password: "secret2" });
    expect(mismatch.status).toBe(400);
    expect(mismatch.body.error).toBe("passwords_do_not_match");

    const wrongType = await request(app)
      .post("/api/auth/signup")
      .send({ ...signup, username: 42 });
    expect(wrongType.body.error).toBe("invalid_body");
  });

  it("rejects bad credentials", async () => {
    const { app } = createTestApp();
    await request(app).post("/api/auth/signup").send(signup);

    const wrong = await request(app)
      .post("/api/auth/login")
      .send({ username: "meena", password: "nope-nope" });
    expect(wrong.status).toBe(401);
    expect(wrong.body.error).toBe("invalid_credentials");

    const unknown = await request(app)
      .post("/api/auth/login")
      .send({ username: "ravi", password: "secret1" });
    expect(unknown.status).toBe(401);

    const empty = await request(app).post("/api/auth/login").send({ username: "meena" });
    expect(empty.status).toBe(400);
    expect(empty.body.error).toBe("username_password_required");
  });

  it("requires a valid token for /me", async () => {
    const { app } = createTestApp();
    expect((await request(app).get("/api/auth/me")).status).toBe(401);
    const bad = await request(app).get("/api/auth/me").set("Authorization", "Bearer nonsense");
    expect(bad.status).toBe(401);
    expect(bad.body.error).toBe("unauthorized");
  });

  it("rejects a token whose user_id is not a row id", async () => {
    const { app } = createTestApp();
    const res = await request(app)
      .get("/api/auth/me")
      .set("Authorization", `Bearer ${signToken("abc", TEST_SECRET)}`);
    expect(res.status).toBe(401);
    expect(res.body).toEqual({ error: "unauthorized" });
  });
});
