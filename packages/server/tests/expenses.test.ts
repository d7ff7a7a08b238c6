import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { PNG_PIXEL, createTestApp, errorCode, multipart, registerTeacher, type SignedIn, type TestApp } from "./helpers.js";

describe("expenses", () => {
  let t: TestApp;
  let teacher: SignedIn;
  let categories: Record<string, string>;

  beforeEach(async () => {
    t = await createTestApp();
    teacher = await registerTeacher(t.app);
    const list = await t.app.inject({ method: "GET", url: "/api/v1/expense-categories", headers: teacher.headers });
    categories = Object.fromEntries(
      list.json().data.map((c: { id: string; name: string }) => [c.name, c.id]),
    );
  });

  afterEach(async () => {
    await t.close();
  });

  const create = (payload: Record<string, unknown>) =>
    t.app.inject({ method: "POST", url: "/api/v1/expenses", headers: teacher.headers, payload });

  async function seed(): Promise<string> {
    const student = await t.app.inject({
      method: "POST",
      url: "/api/v1/students",
      headers: teacher.headers,
      payload: { first_name: "Ada", last_name: "Lovelace" },
    });
    const studentId = student.json().data.id;
    await create({
      amount: 24.99,
      description: "Reader",
      expense_date: "2025-01-15",
      category_id: categories.Books,
      student_id: studentId,
    });
    await create({ amount: 10.01, description: "Workbook", expense_date: "2025-02-03", category_id: categories.Books });
    await create({ amount: 50, description: "Art kit", expense_date: "2025-02-20", category_id: categories.Supplies });
    await create({ amount: 5.5, description: "Bus fare", expense_date: "2025-01-02" });
    return studentId;
  }

  it("stores amounts and defaults the currency", async () => {
    const response = await create({ amount: 12.5, currency: "usd", description: "Pencils", expense_date: "2025-03-01" });
    expect(response.statusCode).toBe(201);
    expect(response.json().data).toMatchObject({
      amount: 12.5,
      currency: "USD",
      description: "Pencils",
      expense_date: "2025-03-01",
      category_id: null,
      is_tax_deductible: false,
      receipt_url: null,
    });

    const plain = await create({ amount: 3, description: "Glue", expense_date: "2025-03-01" });
    expect(plain.json().data.currency).toBe("USD");
  });

  it("validates amount and date", async () => {
    expect((await create({ amount: 0, description: "Free", expense_date: "2025-03-01" })).json().error.details).toEqual({
      amount: ["Amount must be greater than zero"],
    });
    expect(
      (await create({ amount: 1.005, description: "Odd", expense_date: "2025-03-01" })).json().error.details,
    ).toEqual({ amount: ["Amount can have at most two decimals"] });
    expect(
      (await create({ amount: 1, description: "Later", expense_date: "2999-01-01" })).json().error.details,
    ).toEqual({ expense_date: ["Date cannot be in the future"] });
  });

  it("lists newest first and filters by amount", async () => {
    await seed();
    const list = async (query: string) => {
      const response = await t.app.inject({ method: "GET", url: `/api/v1/expenses${query}`, headers: teacher.headers });
      return response.json().data.map((e: { description: string }) => e.description);
    };

    expect(await list("")).toEqual(["Art kit", "Workbook", "Reader", "Bus fare"]);
    expect(await list("?min_amount=20")).toEqual(["Art kit", "Reader"]);
    expect(await list("?sort=amount&order=asc")).toEqual(["Bus fare", "Workbook", "Reader", "Art kit"]);
    expect(await list(`?category_id=${categories.Books}`)).toEqual(["Workbook", "Reader"]);
    expect(await list("?from=2025-02-01&to=2025-02-10")).toEqual(["Workbook"]);
  });

  it("summarizes by category", async () => {
    await seed();
    const response = await t.app.inject({ method: "GET", url: "/api/v1/expenses/summary", headers: teacher.headers });
    expect(response.json().data).toEqual({
      total: 90.5,
      count: 4,
      currency: "USD",
      groups: [
        { key: categories.Supplies, label: "Supplies", total: 50, count: 1 },
        { key: categories.Books, label: "Books", total: 35, count: 2 },
        { key: null, label: "Uncategorized", total: 5.5, count: 1 },
      ],
    });
  });

  it("summarizes by month and by student", async () => {
    const studentId = await seed();

    const months = await t.app.inject({
      method: "GET",
      url: "/api/v1/expenses/summary?group_by=month",
      headers: teacher.headers,
    });
    expect(months.json().data.groups).toEqual([
      { key: "2025-01", label: "January 2025", total: 30.49, count: 2 },
      { key: "2025-02", label: "February 2025", total: 60.01, count: 2 },
    ]);

    const students = await t.app.inject({
      method: "GET",
      url: "/api/v1/expenses/summary?group_by=student",
      headers: teacher.headers,
    });
    expect(students.json().data.groups).toEqual([
      { key: null, label: "Unassigned", total: 65.51, count: 3 },
      { key: studentId, label: "Ada Lovelace", total: 24.99, count: 1 },
    ]);

    const february = await t.app.inject({
      method: "GET",
      url: "/api/v1/expenses/summary?from=2025-02-01",
      headers: teacher.headers,
    });
    expect(february.json().data).toMatchObject({ total: 60.01, count: 2 });
  });

  it("reports no shared currency for mixed currencies", async () => {
    await create({ amount: 10, description: "Books", expense_date: "2025-03-01" });
    await create({ amount: 10, currency: "EUR", description: "Museum", expense_date: "2025-03-01" });
    const response = await t.app.inject({ method: "GET", url: "/api/v1/expenses/summary", headers: teacher.headers });
    expect(response.json().data.currency).toBeNull();
  });

  it("updates and deletes an expense", async () => {
    const id = (await create({ amount: 3, description: "Glue", expense_date: "2025-03-01" })).json().data.id;
    const updated = await t.app.inject({
      method: "PATCH",
      url: `/api/v1/expenses/${id}`,
      headers: teacher.headers,
      payload: { amount: 4.25, vendor: "Corner store", is_tax_deductible: true },
    });
    expect(updated.json().data).toMatchObject({ amount: 4.25, vendor: "Corner store", is_tax_deductible: true });

    const removed = await t.app.inject({ method: "DELETE", url: `/api/v1/expenses/${id}`, headers: teacher.headers });
    expect(removed.statusCode).toBe(204);
  });

  it("attaches, serves and removes a receipt", async () => {
    const id = (await create({ amount: 3, description: "Glue", expense_date: "2025-03-01" })).json().data.id;
    const url = `/api/v1/expenses/${id}/receipt`;

    const missing = await t.app.inject({ method: "GET", url, headers: teacher.headers });
    expect(missing.json().error).toEqual({ code: "NOT_FOUND", message: "Receipt not found" });

    const upload = multipart("receipt.png", "image/png", PNG_PIXEL);
    const attached = await t.app.inject({
      method: "POST",
      url,
      headers: { ...teacher.headers, ...upload.headers },
      payload: upload.payload,
    });
    expect(attached.statusCode).toBe(200);
    expect(attached.json().data).toMatchObject({ receipt_url: url, receipt_file_name: "receipt.png" });

    const served = await t.app.inject({ method: "GET", url, headers: teacher.headers });
    expect(served.statusCode).toBe(200);
    expect(served.rawPayload.equals(PNG_PIXEL)).toBe(true);
    expect(served.headers["content-disposition"]).toBe(
      "attachment; filename=\"receipt.png\"; filename*=UTF-8''receipt.png",
    );

    expect((await t.app.inject({ method: "DELETE", url, headers: teacher.headers })).statusCode).toBe(204);
    const again = await t.app.inject({ method: "DELETE", url, headers: teacher.headers });
    expect(again.statusCode).toBe(404);
  });

  it("rejects receipts of other types", async () => {
    const id = (await create({ amount: 3, description: "Glue", expense_date: "2025-03-01" })).json().data.id;
    const upload = multipart("receipt.txt", "text/plain", "paid");
    const response = await t.app.inject({
      method: "POST",
      url: `/api/v1/expenses/${id}/receipt`,
      headers: { ...teacher.headers, ...upload.headers },
      payload: upload.payload,
    });
    expect(response.statusCode).toBe(415);
    expect(errorCode(response)).toBe("UNSUPPORTED_FILE_TYPE");
  });
});
