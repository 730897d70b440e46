import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { loadConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { InMemoryFormStore } from "./formEngine.js";
import { loadFormsFromDir } from "./formLoader.js";
import { serializeFormSchema } from "./formSchema.js";
import type { FormDefinition } from "./formTypes.js";
import { type FormSchemaGenerator, createGenerator, generateFormJson } from "./llmClient.js";
import { logger } from "./logger.js";
import { cleanJsonOutput } from "./outputCleaner.js";

export const SERVER_NAME = "form-builder";
export const SERVER_VERSION = "0.1.0";

type FormSummary = {
  formId: string;
  prompt: string;
  status: "clarification" | "ready";
  clarification: string | null;
  fieldCount: number;
  submissionCount: number;
  updatedAt: string;
};

const SubmissionValuesSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));

const formIdJsonSchema = { type: "string", description: "Form id returned by generate_form." };
const valuesJsonSchema = {
  type: "object",
  description: "Submitted values keyed by field name.",
  additionalProperties: { type: ["string", "number", "boolean", "null"] },
};

export type ServerDeps = {
  store: InMemoryFormStore;
  generator: FormSchemaGenerator;
};

function summarizeForm(store: InMemoryFormStore, form: FormDefinition): FormSummary {
  const { schema } = form;
  return {
    formId: form.id,
    prompt: form.prompt,
    status: schema.kind === "clarification" ? "clarification" : "ready",
    clarification: schema.kind === "clarification" ? schema.clarification : null,
    fieldCount: schema.kind === "fields" ? schema.fields.length : 0,
    submissionCount: store.listSubmissions(form.id).length,
    updatedAt: form.updatedAt,
  };
}

function describeForm(store: InMemoryFormStore, form: FormDefinition) {
  return {
    form: summarizeForm(store, form),
    schemaJson: serializeFormSchema(form.schema),
    fields: form.schema.kind === "fields" ? form.schema.fields : [],
  };
}

function textResult(value: unknown): CallToolResult {
  return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }] };
}

/** Builds the server and its tools. The caller connects a transport. */
export function createServer({ store, generator }: ServerDeps): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  const registeredTools: Tool[] = [];
  const toolHandlers = new Map<string, (args: unknown) => Promise<unknown>>();

  function registerTool<In extends z.ZodTypeAny>(
    name: string,
    description: string,
    inputSchema: In,
    handler: (input: z.infer<In>) => Promise<unknown> | unknown,
    jsonSchemaStub: Tool["inputSchema"] = { type: "object", properties: {} },
  ) {
    registeredTools.push({ name, description, inputSchema: jsonSchemaStub });
    toolHandlers.set(name, async (args: unknown) => {
      const parsed = inputSchema.safeParse(args);
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`)
          .join(", ");
        throw new Error(`Invalid arguments for ${name}: ${issues}`);
      }
      return handler(parsed.data);
    });
  }

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const handler = toolHandlers.get(name);
    if (!handler) {
      throw new Error(`Tool not found: ${name}`);
    }
    try {
      return textResult(await handler(args ?? {}));
    } catch (err) {
      logger.warn("Tool call failed", { tool: name, error: errorMessage(err) });
      return {
        content: [{ type: "text", text: `Error: ${errorMessage(err)}` }],
        isError: true,
      };
    }
  });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: registeredTools }));

  registerTool(
    "generate_form",
    "Generate a form schema from a natural-language description. Returns the form id and its schema, or a clarification when the request is contradictory.",
    z.object({ prompt: z.string().trim().min(1, "Describe the form first") }),
    async ({ prompt }) => {
      const raw = await generateFormJson(generator, prompt);
      const form = store.registerForm(prompt, cleanJsonOutput(raw));
      logger.info("Form generated", { formId: form.id, kind: form.schema.kind });
      return describeForm(store, form);
    },
    {
      type: "object",
      properties: {
        prompt: {
          type: "string",
          description:
            "e.g. A registration form for new club members with name, email, and favorite anime.",
        },
      },
      required: ["prompt"],
    },
  );

  registerTool(
    "list_forms",
    "List the forms generated or loaded so far.",
    z.object({}),
    () => ({ forms: store.listForms().map((f) => summarizeForm(store, f)) }),
  );

  registerTool(
    "get_form",
    "Get a form's schema JSON and field definitions.",
    z.object({ formId: z.string() }),
    ({ formId }) => describeForm(store, store.requireForm(formId)),
    {
      type: "object",
      properties: { formId: formIdJsonSchema },
      required: ["formId"],
    },
  );

  registerTool(
    "update_form_schema",
    "Replace a form's schema with hand-edited JSON. The previous schema is kept when the JSON is invalid.",
    z.object({ formId: z.string(), schemaJson: z.string() }),
    ({ formId, schemaJson }) => describeForm(store, store.updateSchema(formId, schemaJson)),
    {
      type: "object",
      properties: {
        formId: formIdJsonSchema,
        schemaJson: {
          type: "string",
          description: 'Schema document, e.g. {"clarification": null, "fields": [...]}',
        },
      },
      required: ["formId", "schemaJson"],
    },
  );

  registerTool(
    "validate_submission",
    "Check values against the form's validation rules without saving them.",
    z.object({ formId: z.string(), values: SubmissionValuesSchema }),
    ({ formId, values }) => store.validate(formId, values),
    {
      type: "object",
      properties: { formId: formIdJsonSchema, values: valuesJsonSchema },
      required: ["formId", "values"],
    },
  );

  registerTool(
    "submit_form",
    "Validate and save a response to a form. Returns the errors to correct when validation fails.",
    z.object({ formId: z.string(), values: SubmissionValuesSchema }),
    ({ formId, values }) => {
      const outcome = store.submit(formId, values);
      if (outcome.accepted) {
        logger.info("Submission saved", { formId, submissionId: outcome.submission.id });
      }
      return outcome;
    },
    {
      type: "object",
      properties: { formId: formIdJsonSchema, values: valuesJsonSchema },
      required: ["formId", "values"],
    },
  );

  registerTool(
    "list_submissions",
    "List a form's saved responses as a table: a timestamp column, one column per field, then any other submitted keys.",
    z.object({ formId: z.string() }),
    ({ formId }) => store.tabulateSubmissions(formId),
    {
      type: "object",
      properties: { formId: formIdJsonSchema },
      required: ["formId"],
    },
  );

  return server;
}

export async function run(): Promise<void> {
  const config = loadConfig();
  logger.level = config.logLevel;
  const generator = createGenerator(config);
  const store = new InMemoryFormStore();
  loadFormsFromDir(store, config.formsDir);

  const server = createServer({ store, generator });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("Form builder MCP server ready", { generator: generator.label });
}
