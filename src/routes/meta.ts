import { toolSchemas } from "../tools/index.js";
import type { App, RouteDeps } from "./shared.js";

export function registerMetaRoutes(app: App, { config }: RouteDeps) {
  app.get("/", async () => ({
    name: config.serviceName,
    version: config.version,
    description: config.description,
    endpoints: {
      health: "/health",
      tools: "/tools/schemas",
      video: ["/video/info", "/video/scrape", "/video/metadata", "/video/transcript"],
      playlist: ["/playlist/info", "/playlist/check", "/playlist/videos"],
      ai: ["/ai/summary", "/ai/translate", "/ai/topics", "/ai/enhance", "/ai/health"],
    },
  }));

  app.get("/health", async () => ({
    status: "healthy",
    version: config.version,
    service: config.serviceName,
  }));

  app.get("/tools/schemas", async () => ({
    tools: toolSchemas(),
    format: "openai_function_calling",
    usageExample: {
      description: "Pass these schemas as the tools parameter of an OpenAI-compatible chat completion request",
      example: "client.chat.completions.create({ model, messages, tools })",
    },
  }));
}
