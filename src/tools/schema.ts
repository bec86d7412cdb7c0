export interface JsonSchemaProperty {
  type: "string" | "integer" | "boolean" | "array";
  description: string;
  default?: unknown;
  minimum?: number;
  maximum?: number;
  items?: { type: "string" };
}

/** OpenAI function-calling tool description. */
export interface ToolSchema {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: {
      type: "object";
      properties: Record<string, JsonSchemaProperty>;
      required: string[];
    };
  };
}

export interface TextOrTranscript<T> {
  text?: string;
  transcript?: T[];
}
