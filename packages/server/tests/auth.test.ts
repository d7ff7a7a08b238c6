import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  PASSWORD,
  PNG_PIXEL,
  createTestApp,
  errorCode,
  multipart,
  registerTeacher,
  type TestApp,
} from "./helpers.js";

describe("auth", () => {
  let t: TestApp;

  beforeEach(async () => {
    t = await createTestApp();
  });

  afterEach(async () => {
    await t.close();
  });

  const login = (email: string, password: string) =>
    t.app.inject({ method: "POST", url: "/api/v1/auth/login", payload: { email, password } });

  const refresh = (refreshToken: string) =>
    t.app.inject({ method: "POST", url: "/api/v1/auth/refresh", payload: { refresh_token: refreshToken } });

  it("registers a teacher and returns a token pair", async () => {
    const response = await t.app.inject({
      method: "POST",
      url: "/api/v1/auth/register",
      payload: { email: "Ada@Example.com", password: PASSWORD, first_name: "Ada", last_name: "Lovelace" },
    });

    expect(response.statusCode).toBe(201);
    const { success, data } = response.json();
    expect(success).toBe(true);
    expect(data.token_type).toBe("Bearer");
    expect(data.expires_in).toBe(3600);
    expect(typeof data.access_token).toBe("string");
    expect(typeof data.refresh_token).toBe("string");
    expect(data.teacher).toMatchObject({
      email: "ada@example.com",
      first_name: "Ada",
      last_name: "Lovelace",
      timezone: "UTC",
      email_verified: false,
      is_active: true,
      profile_image_url: null,
    });
    expect(data.teacher).not.toHaveProperty("password_hash");

    expect(t.mailer.sent).toHaveLength(1);
    expect(t.mailer.sent[0].template).toBe("email-verification");
    expect(t.mailer.sent[0].to).toBe("ada@example.com");
    expect(t.mailer.sent[0].subject).toBe("Verify your email address");
  });

  it("rejects a duplicate email regardless of case", async () => {
    await registerTeacher(t.app, { email: "ada@example.com" });
    const response = await t.app.inject({
      method: "POST",
      url: "/api/v1/auth/register",
      payload: { email: "ADA@example.com", password: PASSWORD, first_name: "Ada", last_name: "L" },
    });
    expect(response.statusCode).toBe(409);
    expect(errorCode(response)).toBe("DUPLICATE_EMAIL");
  });

  it("reports every password problem on the password field", async () => {
    const response = await t.app.inject({
      method: "POST",
      url: "/api/v1/auth/register",
      payload: { email: "weak@example.com", password: "short", first_name: "W", last_name: "P" },
    });
    expect(response.statusCode).toBe(422);
    const { error } = response.json();
    expect(error.code).toBe("VALIDATION_ERROR");
    expect(error.details.password).toEqual([
      "Password must be at least 8 characters",
      "Password must contain a digit",
    ]);
  });

  it("gives the same answer for a wrong password and an unknown email", async () => {
    const teacher = await registerTeacher(t.app);
    const wrong = await login(teacher.email, "wrongpass1");
    const unknown = await login("nobody@example.com", PASSWORD);

    for (const response of [wrong, unknown]) {
      expect(response.statusCode).toBe(401);
      expect(response.json().error).toEqual({ code: "INVALID_CREDENTIALS", message: "Invalid email or password" });
    }
    expect((await login(teacher.email, PASSWORD)).statusCode).toBe(200);
  });

  it("requires a bearer token on secured routes", async () => {
    const missing = await t.app.inject({ method: "GET", url: "/api/v1/auth/me" });
    expect(missing.statusCode).toBe(401);
    expect(missing.json().error).toEqual({ code: "UNAUTHORIZED", message: "Authentication required" });

    const garbage = await t.app.inject({
      method: "GET",
      url: "/api/v1/auth/me",
      headers: { authorization: "Bearer not-a-token" },
    });
    expect(garbage.statusCode).toBe(401);
    expect(garbage.json().error.message).toBe("Invalid access token");
  });

  it("rotates refresh tokens and revokes the family on reuse", async () => {
    const teacher = await registerTeacher(t.app);

    const first = await refresh(teacher.refreshToken);
    expect(first.statusCode).toBe(200);
    const rotated: string = first.json().data.refresh_token;
    expect(rotated).not.toBe(teacher.refreshToken);

    const reused = await refresh(teacher.refreshToken);
    expect(reused.statusCode).toBe(401);
    expect(errorCode(reused)).toBe("INVALID_TOKEN");

    // The replacement was revoked along with the rest of the family
    const afterTheft = await refresh(rotated);
    expect(afterTheft.statusCode).toBe(401);
  });

  it("logs out one refresh token", async () => {
    const teacher = await registerTeacher(t.app);
    const response = await t.app.inject({
      method: "POST",
      url: "/api/v1/auth/logout",
      headers: teacher.headers,
      payload: { refresh_token: teacher.refreshToken },
    });
    expect(response.statusCode).toBe(204);
    expect((await refresh(teacher.refreshToken)).statusCode).toBe(401);
  });

  it("logs out of every device", async () => {
    const teacher = await registerTeacher(t.app);
    const second = (await login(teacher.email, PASSWORD)).json().data.refresh_token;

    const response = await t.app.inject({
      method: "POST",
      url: "/api/v1/auth/logout",
      headers: teacher.headers,
      payload: { all_devices: true },
    });
    expect(response.statusCode).toBe(204);
    expect((await refresh(teacher.refreshToken)).statusCode).toBe(401);
    expect((await refresh(second)).statusCode).toBe(401);
  });

  it("verifies the email with the mailed token once", async () => {
    const teacher = await registerTeacher(t.app);
    const token = t.mailer.tokenFor("email-verification", teacher.email);

    const verify = () => t.app.inject({ method: "POST", url: "/api/v1/auth/email/verify", payload: { token } });
    const response = await verify();
    expect(response.statusCode).toBe(200);
    expect(response.json().data).toEqual({ email_verified: true });

    const me = await t.app.inject({ method: "GET", url: "/api/v1/auth/me", headers: teacher.headers });
    expect(me.json().data.email_verified).toBe(true);

    expect(errorCode(await verify())).toBe("INVALID_TOKEN");

    const resend = await t.app.inject({ method: "POST", url: "/api/v1/auth/email/resend", headers: teacher.headers });
    expect(resend.statusCode).toBe(409);
    expect(errorCode(resend)).toBe("CONFLICT");
  });

  it("resets a forgotten password and signs out existing sessions", async () => {
    const teacher = await registerTeacher(t.app);
    const sentBefore = t.mailer.sent.length;

    const unknown = await t.app.inject({
      method: "POST",
      url: "/api/v1/auth/password/forgot",
      payload: { email: "nobody@example.com" },
    });
    const known = await t.app.inject({
      method: "POST",
      url: "/api/v1/auth/password/forgot",
      payload: { email: teacher.email },
    });
    expect(unknown.statusCode).toBe(200);
    expect(known.json()).toEqual(unknown.json());
    expect(t.mailer.sent).toHaveLength(sentBefore + 1);

    const token = t.mailer.tokenFor("password-reset", teacher.email);
    const reset = await t.app.inject({
      method: "POST",
      url: "/api/v1/auth/password/reset",
      payload: { token, password: "newpass456" },
    });
    expect(reset.statusCode).toBe(200);

    expect((await login(teacher.email, PASSWORD)).statusCode).toBe(401);
    expect((await login(teacher.email, "newpass456")).statusCode).toBe(200);
    expect((await refresh(teacher.refreshToken)).statusCode).toBe(401);

    const again = await t.app.inject({
      method: "POST",
      url: "/api/v1/auth/password/reset",
      payload: { token, password: "another789" },
    });
    expect(errorCode(again)).toBe("INVALID_TOKEN");
  });
});

describe("teacher profile", () => {
  let t: TestApp;

  beforeEach(async () => {
    t = await createTestApp();
  });

  afterEach(async () => {
    await t.close();
  });

  it("updates profile fields", async () => {
    const teacher = await registerTeacher(t.app);
    const response = await t.app.inject({
      method: "PATCH",
      url: "/api/v1/teachers/me",
      headers: teacher.headers,
      payload: { phone: "+1 555 0100", timezone: "America/Chicago", bio: "Math and music" },
    });
    expect(response.statusCode).toBe(200);
    expect(response.json().data).toMatchObject({
      phone: "+1 555 0100",
      timezone: "America/Chicago",
      bio: "Math and music",
    });
  });

  it("rejects an unknown time zone", async () => {
    const teacher = await registerTeacher(t.app);
    const response = await t.app.inject({
      method: "PATCH",
      url: "/api/v1/teachers/me",
      headers: teacher.headers,
      payload: { timezone: "Mars/Olympus" },
    });
    expect(response.statusCode).toBe(422);
    expect(response.json().error.details.timezone).toEqual(["Must be an IANA time zone such as America/Chicago"]);
  });

  it("resets verification when the email changes", async () => {
    const teacher = await registerTeacher(t.app);
    const token = t.mailer.tokenFor("email-verification", teacher.email);
    await t.app.inject({ method: "POST", url: "/api/v1/auth/email/verify", payload: { token } });

    const response = await t.app.inject({
      method: "PATCH",
      url: "/api/v1/teachers/me",
      headers: teacher.headers,
      payload: { email: "moved@example.com" },
    });
    expect(response.json().data).toMatchObject({ email: "moved@example.com", email_verified: false });
    expect(t.mailer.sent.at(-1)?.to).toBe("moved@example.com");
  });

  it("changes the password only with the current one", async () => {
    const teacher = await registerTeacher(t.app);
    const wrong = await t.app.inject({
      method: "PUT",
      url: "/api/v1/teachers/me/password",
      headers: teacher.headers,
      payload: { current_password: "wrongpass1", new_password: "newpass456" },
    });
    expect(wrong.statusCode).toBe(401);
    expect(errorCode(wrong)).toBe("INVALID_CREDENTIALS");

    const right = await t.app.inject({
      method: "PUT",
      url: "/api/v1/teachers/me/password",
      headers: teacher.headers,
      payload: { current_password: PASSWORD, new_password: "newpass456" },
    });
    expect(right.statusCode).toBe(200);
    const relogin = await t.app.inject({
      method: "POST",
      url: "/api/v1/auth/login",
      payload: { email: teacher.email, password: "newpass456" },
    });
    expect(relogin.statusCode).toBe(200);
  });

  it("deactivates the account on delete", async () => {
    const teacher = await registerTeacher(t.app);
    const response = await t.app.inject({ method: "DELETE", url: "/api/v1/teachers/me", headers: teacher.headers });
    expect(response.statusCode).toBe(204);

    const me = await t.app.inject({ method: "GET", url: "/api/v1/auth/me", headers: teacher.headers });
    expect(me.statusCode).toBe(401);
    expect(me.json().error.message).toBe("Account is not active");

    const relogin = await t.app.inject({
      method: "POST",
      url: "/api/v1/auth/login",
      payload: { email: teacher.email, password: PASSWORD },
    });
    expect(errorCode(relogin)).toBe("INVALID_CREDENTIALS");
  });

  it("frees the email after a permanent delete", async () => {
    const teacher = await registerTeacher(t.app, { email: "gone@example.com" });
    const response = await t.app.inject({
      method: "DELETE",
      url: "/api/v1/teachers/me?permanent=true",
      headers: teacher.headers,
    });
    expect(response.statusCode).toBe(204);

    const again = await t.app.inject({
      method: "POST",
      url: "/api/v1/auth/register",
      payload: { email: "gone@example.com", password: PASSWORD, first_name: "New", last_name: "Owner" },
    });
    expect(again.statusCode).toBe(201);
  });

  it("stores and serves a profile image", async () => {
    const teacher = await registerTeacher(t.app);
    const missing = await t.app.inject({
      method: "GET",
      url: "/api/v1/teachers/me/profile-image",
      headers: teacher.headers,
    });
    expect(missing.statusCode).toBe(404);

    const upload = multipart("me.png", "image/png", PNG_PIXEL);
    const response = await t.app.inject({
      method: "POST",
      url: "/api/v1/teachers/me/profile-image",
      headers: { ...teacher.headers, ...upload.headers },
      payload: upload.payload,
    });
    expect(response.statusCode).toBe(200);
    expect(response.json().data.profile_image_url).toBe("/api/v1/teachers/me/profile-image");

    const image = await t.app.inject({
      method: "GET",
      url: "/api/v1/teachers/me/profile-image",
      headers: teacher.headers,
    });
    expect(image.statusCode).toBe(200);
    expect(image.headers["content-disposition"]).toBe(
      "inline; filename=\"profile-image.png\"; filename*=UTF-8''profile-image.png",
    );
    expect(image.rawPayload.equals(PNG_PIXEL)).toBe(true);
  });

  it("rejects profile images of the wrong type", async () => {
    const teacher = await registerTeacher(t.app);
    const upload = multipart("notes.txt", "text/plain", "hello");
    const response = await t.app.inject({
      method: "POST",
      url: "/api/v1/teachers/me/profile-image",
      headers: { ...teacher.headers, ...upload.headers },
      payload: upload.payload,
    });
    expect(response.statusCode).toBe(415);
    expect(response.json().error).toEqual({
      code: "UNSUPPORTED_FILE_TYPE",
      message: "File type text/plain is not allowed",
      details: { file: ["Allowed types: image/jpeg, image/png, image/gif, image/webp"] },
    });
  });

  it("requires a multipart body for uploads", async () => {
    const teacher = await registerTeacher(t.app);
    const response = await t.app.inject({
      method: "POST",
      url: "/api/v1/teachers/me/profile-image",
      headers: teacher.headers,
      payload: { file: "not a file" },
    });
    expect(response.statusCode).toBe(422);
    expect(response.json().error.details).toEqual({ file: ["Request must be multipart/form-data"] });
  });
});
