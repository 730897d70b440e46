import { describe, expect, it } from "vitest";
import { FormNotFillableError, FormNotFoundError, InvalidFormSchemaError } from "../errors.js";
import {
  InMemoryFormStore,
  compileFields,
  deriveFormId,
  validateSubmission,
  valueText,
} from "../formEngine.js";
import type { FieldDefinition, FieldType } from "../formTypes.js";

function field(name: string, label: string, type: FieldType, validation: string): FieldDefinition {
  return { name, label, type, validation };
}

function check(def: FieldDefinition, value: string | number | boolean | null): string[] {
  return validateSubmission(compileFields([def]), { [def.name]: value }).errors;
}

const CLOCK = new Date("2026-01-02T03:04:05.000Z");

const contactSchema = JSON.stringify({
  clarification: null,
  fields: [
    { name: "full_name", label: "Full Name", type: "text", validation: "required,min_length:2" },
    { name: "email", label: "Email", type: "email", validation: "required" },
  ],
});

describe("validateSubmission", () => {
  it("rejects empty and whitespace-only values for required fields", () => {
    const name = field("name", "Name", "text", "required");
    expect(check(name, "")).toEqual(["Name is required."]);
    expect(check(name, "   ")).toEqual(["Name is required."]);
    expect(check(name, null)).toEqual(["Name is required."]);
    expect(check(name, "x")).toEqual([]);
  });

  it("reports a missing required value", () => {
    const name = field("name", "Name", "text", "required");
    expect(validateSubmission(compileFields([name]), {}).errors).toEqual(["Name is required."]);
  });

  it("skips other rules on an empty optional value", () => {
    expect(check(field("bio", "Bio", "textarea", "min_length:5"), "")).toEqual([]);
  });

  it("enforces min_length on the trimmed value", () => {
    const bio = field("bio", "Bio", "textarea", "min_length:5");
    expect(check(bio, "abcd")).toEqual(["Bio must be at least 5 characters long."]);
    expect(check(bio, " abcd ")).toEqual(["Bio must be at least 5 characters long."]);
    expect(check(bio, "abcde")).toEqual([]);
  });

  it("checks email fields once", () => {
    const email = field("email", "Email", "email", "optional");
    expect(check(email, "not-an-email")).toEqual(["Email requires a valid email format."]);
    expect(check(email, "a@b.com")).toEqual([]);

    const strict = field("email", "Email", "email", "required,email_format");
    expect(check(strict, "not-an-email")).toEqual(["Email requires a valid email format."]);
  });

  it("applies email_format to text fields", () => {
    expect(check(field("contact", "Contact", "text", "email_format"), "someone@")).toEqual([
      "Contact requires a valid email format.",
    ]);
  });

  it("ignores one decimal point when counting a number's length", () => {
    expect(check(field("code", "Code", "number", "exact_length:5"), "123.45")).toEqual([]);
    expect(check(field("code", "Code", "number", "exact_length:5"), 12345)).toEqual([]);
    expect(check(field("zip", "Zip", "text", "exact_length:5"), "123.45")).toEqual([
      "Zip must be exactly 5 characters long.",
    ]);
  });

  it("counts emoji as single characters in length rules", () => {
    expect(check(field("nick", "Nickname", "text", "min_length:3"), "😀😀")).toEqual([
      "Nickname must be at least 3 characters long.",
    ]);
    expect(check(field("code", "Code", "text", "exact_length:2"), "😀😀")).toEqual([]);
    expect(check(field("code", "Code", "text", "exact_length:2"), "😀😀😀")).toEqual([
      "Code must be exactly 2 characters long.",
    ]);
  });

  it("requires digits for number_only", () => {
    const age = field("age", "Age", "text", "number_only");
    expect(check(age, "12a")).toEqual(["Age must contain only numeric digits."]);
    expect(check(age, "42.5")).toEqual([]);
  });

  it("collects every violation instead of stopping at the first", () => {
    const pin = field("pin", "PIN", "text", "min_length:5,number_only");
    const email = field("email", "Email", "email", "required");
    const result = validateSubmission(compileFields([pin, email]), { pin: "ab", email: "" });
    expect(result.errors).toEqual([
      "PIN must be at least 5 characters long.",
      "PIN must contain only numeric digits.",
      "Email is required.",
    ]);
  });

  it("treats an unchecked required checkbox as empty", () => {
    const terms = field("terms", "Accept terms", "checkbox", "required");
    expect(check(terms, false)).toEqual(["Accept terms is required."]);
    expect(check(terms, true)).toEqual([]);
  });

  it("keeps only values of known fields", () => {
    const name = field("name", "Name", "text", "optional");
    const result = validateSubmission(compileFields([name]), { name: "Ada", extra: "x" });
    expect(result.data).toEqual({ name: "Ada" });
  });
});

describe("valueText", () => {
  it("stringifies and trims", () => {
    expect(valueText(undefined)).toBe("");
    expect(valueText(true)).toBe("true");
    expect(valueText(3.5)).toBe("3.5");
    expect(valueText("  hi ")).toBe("hi");
  });
});

describe("deriveFormId", () => {
  it("hashes the trimmed prompt", () => {
    expect(deriveFormId("  Contact form ")).toBe(deriveFormId("Contact form"));
    expect(deriveFormId("Contact form")).toMatch(/^[0-9a-f]{64}$/);
    expect(deriveFormId("Contact form")).not.toBe(deriveFormId("Feedback form"));
  });
});

describe("InMemoryFormStore", () => {
  const newStore = () => new InMemoryFormStore(() => CLOCK);

  it("registers a generated form under its prompt hash", () => {
    const store = newStore();
    const form = store.registerForm(" Contact form ", contactSchema);
    expect(form.id).toBe(deriveFormId("Contact form"));
    expect(form.prompt).toBe("Contact form");
    expect(form.schema.kind).toBe("fields");
    expect(form.createdAt).toBe("2026-01-02T03:04:05.000Z");
    expect(store.listForms()).toEqual([form]);
  });

  it("stores unreadable output as a clarification", () => {
    const store = newStore();
    const form = store.registerForm("Broken", "not json");
    expect(form.source).toBe("not json");
    expect(form.schema.kind).toBe("clarification");
    if (form.schema.kind === "clarification") {
      expect(form.schema.clarification).toMatch(/^The generated schema could not be read: Malformed JSON: /);
    }
    expect(() => store.validate(form.id, {})).toThrow(FormNotFillableError);
  });

  it("keeps the previous schema when an edit is invalid", () => {
    const store = newStore();
    const form = store.registerForm("Contact form", contactSchema);
    expect(() => store.updateSchema(form.id, '{"fields": [')).toThrow(InvalidFormSchemaError);
    expect(store.requireForm(form.id).schema).toEqual(form.schema);
    expect(store.requireForm(form.id).source).toBe(contactSchema);
  });

  it("applies a valid edit and validates against the new rules", () => {
    const store = newStore();
    const form = store.registerForm("Contact form", contactSchema);
    const edited = JSON.stringify({
      fields: [{ name: "nickname", label: "Nickname", type: "text", validation: "required" }],
    });
    store.updateSchema(form.id, edited);
    expect(store.validate(form.id, {}).errors).toEqual(["Nickname is required."]);
  });

  it("only saves submissions that pass validation", () => {
    const store = newStore();
    const form = store.registerForm("Contact form", contactSchema);

    const rejected = store.submit(form.id, { full_name: "A", email: "nope" });
    expect(rejected).toEqual({
      accepted: false,
      errors: ["Full Name must be at least 2 characters long.", "Email requires a valid email format."],
    });
    expect(store.listSubmissions(form.id)).toEqual([]);

    const accepted = store.submit(form.id, { full_name: "Ada Lovelace", email: "ada@example.com" });
    expect(accepted.accepted).toBe(true);
    if (accepted.accepted) {
      expect(accepted.submission.id).toMatch(/^[0-9a-f-]{36}$/);
      expect(accepted.submission.timestamp).toBe("2026-01-02T03:04:05.000Z");
      expect(accepted.submission.values).toEqual({ full_name: "Ada Lovelace", email: "ada@example.com" });
    }
    expect(store.listSubmissions(form.id)).toHaveLength(1);
  });

  it("keeps submissions when the same prompt is generated again", () => {
    const store = newStore();
    const form = store.registerForm("Contact form", contactSchema);
    store.submit(form.id, { full_name: "Ada Lovelace", email: "ada@example.com" });
    store.registerForm("Contact form", contactSchema);
    expect(store.listSubmissions(form.id)).toHaveLength(1);
  });

  it("tabulates submissions by the current fields", () => {
    const store = newStore();
    const form = store.registerForm("Contact form", contactSchema);
    store.submit(form.id, { full_name: "Ada Lovelace", email: "ada@example.com" });
    expect(store.tabulateSubmissions(form.id)).toEqual({
      formId: form.id,
      total: 1,
      columns: ["timestamp", "full_name", "email"],
      rows: [["2026-01-02T03:04:05.000Z", "Ada Lovelace", "ada@example.com"]],
    });
  });

  it("keeps answers to renamed fields in the table", () => {
    const store = newStore();
    const form = store.registerForm("Contact form", contactSchema);
    store.submit(form.id, { full_name: "Ada Lovelace", email: "ada@example.com" });
    store.updateSchema(
      form.id,
      JSON.stringify({
        fields: [
          { name: "full_name", label: "Full Name", type: "text", validation: "required" },
          { name: "work_email", label: "Work Email", type: "email", validation: "required" },
        ],
      }),
    );
    store.submit(form.id, { full_name: "Grace Hopper", work_email: "grace@example.com" });

    expect(store.tabulateSubmissions(form.id)).toEqual({
      formId: form.id,
      total: 2,
      columns: ["timestamp", "full_name", "work_email", "email"],
      rows: [
        ["2026-01-02T03:04:05.000Z", "Ada Lovelace", null, "ada@example.com"],
        ["2026-01-02T03:04:05.000Z", "Grace Hopper", "grace@example.com", null],
      ],
    });
  });

  it("keeps answers when the form turns into a clarification", () => {
    const store = newStore();
    const form = store.registerForm("Contact form", contactSchema);
    store.submit(form.id, { full_name: "Ada Lovelace", email: "ada@example.com" });
    store.registerForm("Contact form", '{"clarification": "Which contact details?"}');

    expect(store.tabulateSubmissions(form.id)).toEqual({
      formId: form.id,
      total: 1,
      columns: ["timestamp", "full_name", "email"],
      rows: [["2026-01-02T03:04:05.000Z", "Ada Lovelace", "ada@example.com"]],
    });
  });

  it("fails on unknown forms", () => {
    const store = newStore();
    expect(() => store.requireForm("nope")).toThrow(FormNotFoundError);
    expect(() => store.listSubmissions("nope")).toThrow("Form not found: nope");
    expect(store.getForm("nope")).toBeUndefined();
  });
});
