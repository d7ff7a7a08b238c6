import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createTestApp, errorCode, multipart, registerTeacher, type SignedIn, type TestApp } from "./helpers.js";

describe("assignments", () => {
  let t: TestApp;
  let teacher: SignedIn;
  let studentId: string;

  beforeEach(async () => {
    t = await createTestApp();
    teacher = await registerTeacher(t.app);
    const student = await t.app.inject({
      method: "POST",
      url: "/api/v1/students",
      headers: teacher.headers,
      payload: { first_name: "Ada", last_name: "Lovelace" },
    });
    studentId = student.json().data.id;
  });

  afterEach(async () => {
    await t.close();
  });

  const create = (payload: Record<string, unknown>) =>
    t.app.inject({
      method: "POST",
      url: "/api/v1/assignments",
      headers: teacher.headers,
      payload: { student_id: studentId, ...payload },
    });

  it("starts unscored assignments as assigned", async () => {
    const response = await create({ title: "Fractions worksheet", due_date: "2025-09-10" });
    expect(response.statusCode).toBe(201);
    expect(response.json().data).toMatchObject({
      title: "Fractions worksheet",
      due_date: "2025-09-10",
      status: "assigned",
      score: null,
      grade: null,
      completed_at: null,
      attachments: [],
    });
    expect(response.json().data.assigned_date).toMatch(/^\d{4}-\d{2}-\d{2}$/);
  });

  it("grades a scored assignment against its max score", async () => {
    const response = await create({ title: "Quiz", max_score: 20, score: 17 });
    expect(response.json().data).toMatchObject({ status: "graded", score: 17, grade: "B" });
  });

  it("rejects a score above the max", async () => {
    const response = await create({ title: "Quiz", max_score: 20, score: 25 });
    expect(response.statusCode).toBe(422);
    expect(response.json().error.details).toEqual({ score: ["Score cannot exceed max score"] });

    const id = (await create({ title: "Quiz", max_score: 20 })).json().data.id;
    const update = await t.app.inject({
      method: "PATCH",
      url: `/api/v1/assignments/${id}`,
      headers: teacher.headers,
      payload: { score: 21 },
    });
    expect(update.json().error.details).toEqual({ score: ["Score cannot exceed max score"] });
  });

  it("stamps completion on submit and grades on scoring", async () => {
    const id = (await create({ title: "Essay" })).json().data.id;
    const url = `/api/v1/assignments/${id}`;

    const submitted = await t.app.inject({ method: "PATCH", url, headers: teacher.headers, payload: { status: "submitted" } });
    expect(submitted.json().data.status).toBe("submitted");
    expect(submitted.json().data.completed_at).not.toBeNull();

    const scored = await t.app.inject({ method: "PATCH", url, headers: teacher.headers, payload: { score: 64 } });
    expect(scored.json().data).toMatchObject({ status: "graded", grade: "D" });

    const reopened = await t.app.inject({ method: "PATCH", url, headers: teacher.headers, payload: { status: "in_progress" } });
    expect(reopened.json().data.completed_at).toBeNull();
  });

  it("lists overdue work that is not turned in", async () => {
    await create({ title: "Late map", due_date: "2020-01-01" });
    await create({ title: "Graded map", due_date: "2020-01-02", score: 90 });
    await create({ title: "Future map", due_date: "2999-01-01" });

    const overdue = await t.app.inject({
      method: "GET",
      url: "/api/v1/assignments?overdue=true",
      headers: teacher.headers,
    });
    expect(overdue.json().data.map((a: { title: string }) => a.title)).toEqual(["Late map"]);

    const all = await t.app.inject({ method: "GET", url: "/api/v1/assignments", headers: teacher.headers });
    expect(all.json().data.map((a: { title: string }) => a.title)).toEqual(["Late map", "Graded map", "Future map"]);
  });

  it("rejects another teacher's student", async () => {
    const other = await registerTeacher(t.app);
    const response = await t.app.inject({
      method: "POST",
      url: "/api/v1/assignments",
      headers: other.headers,
      payload: { student_id: studentId, title: "Borrowed" },
    });
    expect(response.statusCode).toBe(422);
    expect(response.json().error.details).toEqual({ student_id: ["Student not found"] });
  });

  it("uploads, downloads and removes attachments", async () => {
    const id = (await create({ title: "Essay" })).json().data.id;
    const upload = multipart("notes.txt", "text/plain", "Show your work");

    const added = await t.app.inject({
      method: "POST",
      url: `/api/v1/assignments/${id}/attachments`,
      headers: { ...teacher.headers, ...upload.headers },
      payload: upload.payload,
    });
    expect(added.statusCode).toBe(201);
    const attachment = added.json().data;
    expect(attachment).toMatchObject({
      file_name: "notes.txt",
      mime_type: "text/plain",
      size_bytes: 14,
      url: `/api/v1/assignments/${id}/attachments/${attachment.id}`,
    });

    const assignment = await t.app.inject({ method: "GET", url: `/api/v1/assignments/${id}`, headers: teacher.headers });
    expect(assignment.json().data.attachments.map((a: { id: string }) => a.id)).toEqual([attachment.id]);

    const download = await t.app.inject({ method: "GET", url: attachment.url, headers: teacher.headers });
    expect(download.statusCode).toBe(200);
    expect(download.body).toBe("Show your work");
    expect(download.headers["content-disposition"]).toBe(
      "attachment; filename=\"notes.txt\"; filename*=UTF-8''notes.txt",
    );

    const removed = await t.app.inject({ method: "DELETE", url: attachment.url, headers: teacher.headers });
    expect(removed.statusCode).toBe(204);
    const gone = await t.app.inject({ method: "GET", url: attachment.url, headers: teacher.headers });
    expect(gone.statusCode).toBe(404);
  });

  it("refuses attachment types outside the policy", async () => {
    const id = (await create({ title: "Essay" })).json().data.id;
    const upload = multipart("archive.zip", "application/zip", "PK");
    const response = await t.app.inject({
      method: "POST",
      url: `/api/v1/assignments/${id}/attachments`,
      headers: { ...teacher.headers, ...upload.headers },
      payload: upload.payload,
    });
    expect(response.statusCode).toBe(415);
    expect(errorCode(response)).toBe("UNSUPPORTED_FILE_TYPE");
  });

  it("hides assignments from other teachers", async () => {
    const id = (await create({ title: "Essay" })).json().data.id;
    const other = await registerTeacher(t.app);
    const response = await t.app.inject({ method: "GET", url: `/api/v1/assignments/${id}`, headers: other.headers });
    expect(response.statusCode).toBe(404);
    expect(response.json().error.message).toBe("Assignment not found");
  });

  it("deletes an assignment", async () => {
    const id = (await create({ title: "Essay" })).json().data.id;
    const response = await t.app.inject({ method: "DELETE", url: `/api/v1/assignments/${id}`, headers: teacher.headers });
    expect(response.statusCode).toBe(204);
  });
});

describe("tasks", () => {
  let t: TestApp;
  let teacher: SignedIn;

  beforeEach(async () => {
    t = await createTestApp();
    teacher = await registerTeacher(t.app);
  });

  afterEach(async () => {
    await t.close();
  });

  const create = (payload: Record<string, unknown>) =>
    t.app.inject({ method: "POST", url: "/api/v1/tasks", headers: teacher.headers, payload });

  const titles = async (query: string): Promise<string[]> => {
    const response = await t.app.inject({ method: "GET", url: `/api/v1/tasks${query}`, headers: teacher.headers });
    expect(response.statusCode).toBe(200);
    return response.json().data.map((task: { title: string }) => task.title);
  };

  it("creates a task with defaults", async () => {
    const response = await create({ title: "Order books" });
    expect(response.statusCode).toBe(201);
    expect(response.json().data).toMatchObject({
      title: "Order books",
      priority: "medium",
      status: "pending",
      due_date: null,
      completed_at: null,
    });
  });

  it("completes and reopens a task", async () => {
    const id = (await create({ title: "Order books" })).json().data.id;

    const done = await t.app.inject({ method: "POST", url: `/api/v1/tasks/${id}/complete`, headers: teacher.headers });
    expect(done.json().data.status).toBe("completed");
    expect(done.json().data.completed_at).not.toBeNull();

    const reopened = await t.app.inject({
      method: "PATCH",
      url: `/api/v1/tasks/${id}`,
      headers: teacher.headers,
      payload: { status: "pending" },
    });
    expect(reopened.json().data).toMatchObject({ status: "pending", completed_at: null });
  });

  it("filters by a list of statuses and sorts by priority", async () => {
    await create({ title: "Plan field trip", priority: "low" });
    await create({ title: "Grade essays", priority: "high", status: "in_progress" });
    await create({ title: "File receipts", status: "completed" });

    expect(await titles("?status=pending,in_progress&sort=priority")).toEqual(["Grade essays", "Plan field trip"]);
    expect(await titles("?sort=priority")).toEqual(["Grade essays", "File receipts", "Plan field trip"]);
    expect(await titles("?priority=low")).toEqual(["Plan field trip"]);
  });

  it("sorts undated tasks last", async () => {
    await create({ title: "Someday" });
    await create({ title: "Soon", due_date: "2025-09-05" });
    await create({ title: "Sooner", due_date: "2025-09-01" });

    expect(await titles("")).toEqual(["Sooner", "Soon", "Someday"]);
  });

  it("rejects an unknown status filter", async () => {
    const response = await t.app.inject({ method: "GET", url: "/api/v1/tasks?status=done", headers: teacher.headers });
    expect(response.statusCode).toBe(400);
    expect(errorCode(response)).toBe("VALIDATION_ERROR");
  });

  it("deletes a task", async () => {
    const id = (await create({ title: "Order books" })).json().data.id;
    expect((await t.app.inject({ method: "DELETE", url: `/api/v1/tasks/${id}`, headers: teacher.headers })).statusCode).toBe(204);
    const after = await t.app.inject({ method: "GET", url: `/api/v1/tasks/${id}`, headers: teacher.headers });
    expect(after.statusCode).toBe(404);
  });
});
