import { describe, expect, test } from "vitest";
import { Envelope } from "../envelope.js";
import { ResourceResponse } from "../resource-response.js";

// ============================================================================
// Envelope
// ============================================================================

describe("Envelope.item", () => {
  test("unwraps a data envelope", () => {
    expect(Envelope.item({ data: { id: 1 } })).toEqual({ id: 1 });
  });

  test("uses a bare map as is", () => {
    expect(Envelope.item({ id: 1, data: "text" })).toEqual({ id: 1, data: "text" });
  });

  test("anything else has no item", () => {
    expect(Envelope.item([{ id: 1 }])).toBeNull();
    expect(Envelope.item("ok")).toBeNull();
    expect(Envelope.item(null)).toBeNull();
  });
});

describe("Envelope.list", () => {
  test("unwraps a data envelope or takes a bare list", () => {
    expect(Envelope.list({ data: [{ id: 1 }] })).toEqual([{ id: 1 }]);
    expect(Envelope.list([{ id: 2 }])).toEqual([{ id: 2 }]);
  });

  test("drops items that are not maps", () => {
    expect(Envelope.list([{ id: 1 }, 2, null, [3]])).toEqual([{ id: 1 }]);
  });

  test("anything else is an empty list", () => {
    expect(Envelope.list({ id: 1 })).toEqual([]);
    expect(Envelope.list(undefined)).toEqual([]);
  });
});

// ============================================================================
// ResourceResponse
// ============================================================================

describe("ResourceResponse", () => {
  test("status helpers", () => {
    const ok = new ResourceResponse({ statusCode: 201 });
    expect(ok.successful).toBe(true);
    expect(ok.failed).toBe(false);

    const missing = new ResourceResponse({ statusCode: 404 });
    expect(missing.failed).toBe(true);
    expect(missing.clientError).toBe(true);
    expect(missing.notFound).toBe(true);
    expect(missing.serverError).toBe(false);

    expect(new ResourceResponse({ statusCode: 401 }).unauthorized).toBe(true);
    expect(new ResourceResponse({ statusCode: 403 }).forbidden).toBe(true);
    expect(new ResourceResponse({ statusCode: 503 }).serverError).toBe(true);
    expect(new ResourceResponse({ statusCode: 302 }).successful).toBe(false);
  });

  test("validation errors", () => {
    const response = new ResourceResponse({
      statusCode: 422,
      data: {
        message: "The given data was invalid.",
        errors: { email: ["Email is taken.", "Email is too long."], name: "Name is required." },
      },
    });

    expect(response.isValidationError).toBe(true);
    expect(response.errors).toEqual({
      email: ["Email is taken.", "Email is too long."],
      name: ["Name is required."],
    });
    expect(response.errorsList).toEqual(["Email is taken.", "Email is too long.", "Name is required."]);
    expect(response.firstError).toBe("Email is taken.");
    expect(response.errorMessage).toBe("The given data was invalid.");
  });

  test("error message falls back to the status text when the body is not a map", () => {
    const response = new ResourceResponse({ statusCode: 500, data: "boom", message: "Internal Server Error" });
    expect(response.errors).toEqual({});
    expect(response.firstError).toBe("Internal Server Error");
    expect(response.errorMessage).toBe("Internal Server Error");
  });

  test("get() walks dotted keys", () => {
    const response = new ResourceResponse({ statusCode: 200, data: { meta: { total: 3 }, id: 1 } });
    expect(response.get("id")).toBe(1);
    expect(response.get("meta.total")).toBe(3);
    expect(response.get("meta.missing")).toBeNull();
    expect(response.get("id.deeper")).toBeNull();
  });

  test("item() and list() unwrap envelopes", () => {
    expect(new ResourceResponse({ statusCode: 200, data: { data: { id: 9 } } }).item()).toEqual({ id: 9 });
    expect(new ResourceResponse({ statusCode: 200, data: [{ id: 9 }] }).list()).toEqual([{ id: 9 }]);
  });

  test("headers are frozen copies", () => {
    const headers = { "content-type": "application/json" };
    const response = new ResourceResponse({ statusCode: 200, headers });
    headers["content-type"] = "text/plain";
    expect(response.headers["content-type"]).toBe("application/json");
    expect(Object.isFrozen(response.headers)).toBe(true);
  });
});
