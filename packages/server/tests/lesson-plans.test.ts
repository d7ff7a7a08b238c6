import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createTestApp, registerTeacher, type SignedIn, type TestApp } from "./helpers.js";

describe("lesson plans", () => {
  let t: TestApp;
  let owner: SignedIn;
  let colleague: SignedIn;
  let stranger: SignedIn;

  beforeEach(async () => {
    t = await createTestApp();
    owner = await registerTeacher(t.app, { first_name: "Mary", last_name: "Somerville" });
    colleague = await registerTeacher(t.app);
    stranger = await registerTeacher(t.app);
  });

  afterEach(async () => {
    await t.close();
  });

  async function createPlan(who: SignedIn, payload: Record<string, unknown>): Promise<string> {
    const response = await t.app.inject({ method: "POST", url: "/api/v1/lesson-plans", headers: who.headers, payload });
    expect(response.statusCode).toBe(201);
    return response.json().data.id;
  }

  const share = (planId: string, payload: Record<string, unknown>) =>
    t.app.inject({ method: "POST", url: `/api/v1/lesson-plans/${planId}/share`, headers: owner.headers, payload });

  const titles = async (who: SignedIn, url: string): Promise<string[]> => {
    const response = await t.app.inject({ method: "GET", url, headers: who.headers });
    expect(response.statusCode).toBe(200);
    return response.json().data.map((p: { title: string }) => p.title);
  };

  it("creates a private plan with normalized tags", async () => {
    const response = await t.app.inject({
      method: "POST",
      url: "/api/v1/lesson-plans",
      headers: owner.headers,
      payload: {
        title: "Fractions with pizza",
        grade_level: "3",
        duration_minutes: 45,
        objectives: ["Compare halves and quarters"],
        tags: ["Math", "Hands-On"],
      },
    });
    expect(response.statusCode).toBe(201);
    expect(response.json().data).toMatchObject({
      teacher_id: owner.teacherId,
      author: { id: owner.teacherId, first_name: "Mary", last_name: "Somerville" },
      title: "Fractions with pizza",
      grade_level: "3",
      duration_minutes: 45,
      objectives: ["Compare halves and quarters"],
      materials: [],
      tags: ["math", "hands-on"],
      is_public: false,
      copied_from_id: null,
      attachments: [],
    });
  });

  it("hides private plans and forbids changes to visible ones", async () => {
    const id = await createPlan(owner, { title: "Fractions with pizza" });
    const url = `/api/v1/lesson-plans/${id}`;

    const hidden = await t.app.inject({ method: "GET", url, headers: colleague.headers });
    expect(hidden.statusCode).toBe(404);
    expect(hidden.json().error.message).toBe("Lesson plan not found");

    await t.app.inject({ method: "PATCH", url, headers: owner.headers, payload: { is_public: true } });
    expect((await t.app.inject({ method: "GET", url, headers: colleague.headers })).statusCode).toBe(200);

    const edit = await t.app.inject({ method: "PATCH", url, headers: colleague.headers, payload: { title: "Mine now" } });
    expect(edit.statusCode).toBe(403);
    expect(edit.json().error).toEqual({ code: "FORBIDDEN", message: "Only the owner can change this lesson plan" });

    const remove = await t.app.inject({ method: "DELETE", url, headers: colleague.headers });
    expect(remove.statusCode).toBe(403);
  });

  it("shares a plan by email and mails the recipient", async () => {
    const id = await createPlan(owner, { title: "Fractions with pizza" });

    const first = await share(id, { email: colleague.email.toUpperCase(), message: "Try this" });
    expect(first.statusCode).toBe(201);
    expect(first.json().data).toMatchObject({ lesson_plan_id: id, email: colleague.email, message: "Try this" });

    const mail = t.mailer.sent.filter((m) => m.template === "lesson-plan-shared");
    expect(mail).toHaveLength(1);
    expect(mail[0].to).toBe(colleague.email);
    expect(mail[0].subject).toBe("Mary Somerville shared a lesson plan with you");
    expect(mail[0].text.split("\n")[0]).toBe('Mary Somerville shared the lesson plan "Fractions with pizza" with you.');

    const again = await share(id, { email: colleague.email, message: "Updated note" });
    expect(again.statusCode).toBe(200);
    expect(again.json().data).toMatchObject({ id: first.json().data.id, message: "Updated note" });
    expect(t.mailer.sent.filter((m) => m.template === "lesson-plan-shared")).toHaveLength(2);

    expect(await titles(colleague, "/api/v1/lesson-plans/shared")).toEqual(["Fractions with pizza"]);
    expect(await titles(owner, "/api/v1/lesson-plans/shared")).toEqual([]);
    expect(await titles(stranger, "/api/v1/lesson-plans/shared")).toEqual([]);

    const visible = await t.app.inject({ method: "GET", url: `/api/v1/lesson-plans/${id}`, headers: colleague.headers });
    expect(visible.statusCode).toBe(200);
    const strangerView = await t.app.inject({
      method: "GET",
      url: `/api/v1/lesson-plans/${id}`,
      headers: stranger.headers,
    });
    expect(strangerView.statusCode).toBe(404);
  });

  it("refuses to share with yourself", async () => {
    const id = await createPlan(owner, { title: "Fractions with pizza" });
    const response = await share(id, { email: owner.email });
    expect(response.statusCode).toBe(422);
    expect(response.json().error.details).toEqual({ email: ["You cannot share a lesson plan with yourself"] });
  });

  it("lists and revokes shares", async () => {
    const id = await createPlan(owner, { title: "Fractions with pizza" });
    await share(id, { email: colleague.email });

    const listed = await t.app.inject({
      method: "GET",
      url: `/api/v1/lesson-plans/${id}/shares`,
      headers: owner.headers,
    });
    const shares = listed.json().data;
    expect(shares.map((s: { email: string }) => s.email)).toEqual([colleague.email]);

    const revoked = await t.app.inject({
      method: "DELETE",
      url: `/api/v1/lesson-plans/${id}/shares/${shares[0].id}`,
      headers: owner.headers,
    });
    expect(revoked.statusCode).toBe(204);

    const hidden = await t.app.inject({ method: "GET", url: `/api/v1/lesson-plans/${id}`, headers: colleague.headers });
    expect(hidden.statusCode).toBe(404);
  });

  it("copies a visible plan as a private plan of the caller", async () => {
    const subject = await t.app.inject({
      method: "POST",
      url: "/api/v1/subjects",
      headers: owner.headers,
      payload: { name: "Math" },
    });
    const subjectId = subject.json().data.id;
    const id = await createPlan(owner, {
      title: "Fractions with pizza",
      subject_id: subjectId,
      materials: ["Paper plates"],
      is_public: true,
    });

    const copied = await t.app.inject({ method: "POST", url: `/api/v1/lesson-plans/${id}/copy`, headers: colleague.headers });
    expect(copied.statusCode).toBe(201);
    expect(copied.json().data).toMatchObject({
      teacher_id: colleague.teacherId,
      title: "Fractions with pizza",
      materials: ["Paper plates"],
      subject_id: null,
      is_public: false,
      copied_from_id: id,
    });

    const own = await t.app.inject({ method: "POST", url: `/api/v1/lesson-plans/${id}/copy`, headers: owner.headers });
    expect(own.json().data.subject_id).toBe(subjectId);

    expect(await titles(colleague, "/api/v1/lesson-plans")).toEqual(["Fractions with pizza"]);
  });

  it("cannot copy a plan it cannot see", async () => {
    const id = await createPlan(owner, { title: "Fractions with pizza" });
    const response = await t.app.inject({ method: "POST", url: `/api/v1/lesson-plans/${id}/copy`, headers: stranger.headers });
    expect(response.statusCode).toBe(404);
  });

  it("searches the public library", async () => {
    await createPlan(owner, {
      title: "Volcano experiment",
      description: "Baking soda eruption",
      tags: ["science"],
      is_public: true,
    });
    await createPlan(owner, { title: "Volcano notes", description: "Private draft" });
    await createPlan(colleague, { title: "Poetry slam", grade_level: "8", is_public: true });

    expect(await titles(stranger, "/api/v1/lesson-plans/public?q=volcano")).toEqual(["Volcano experiment"]);
    expect(await titles(stranger, "/api/v1/lesson-plans/public?q=erupt")).toEqual(["Volcano experiment"]);
    expect(await titles(stranger, "/api/v1/lesson-plans/public?grade_level=8")).toEqual(["Poetry slam"]);
    expect(await titles(stranger, "/api/v1/lesson-plans/public?tag=science")).toEqual(["Volcano experiment"]);
  });

  it("filters own plans by tag and search", async () => {
    await createPlan(owner, { title: "Volcano experiment", tags: ["science"] });
    await createPlan(owner, { title: "Poetry slam", description: "Spoken word", tags: ["writing"] });

    expect(await titles(owner, "/api/v1/lesson-plans?tag=writing")).toEqual(["Poetry slam"]);
    expect(await titles(owner, "/api/v1/lesson-plans?search=spoken")).toEqual(["Poetry slam"]);
  });

  it("lets the owner delete a plan", async () => {
    const id = await createPlan(owner, { title: "Fractions with pizza" });
    const removed = await t.app.inject({ method: "DELETE", url: `/api/v1/lesson-plans/${id}`, headers: owner.headers });
    expect(removed.statusCode).toBe(204);
    expect(await titles(owner, "/api/v1/lesson-plans")).toEqual([]);
  });
});
