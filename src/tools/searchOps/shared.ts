import { JsonObject, ToolContextResult } from "../../types";

/** Payload order is fixed: `status` first, the given fields, `instruction` last. */
export function contextResult(fields: JsonObject, instruction: string): ToolContextResult {
  return {
    status: "context_provided",
    ...fields,
    instruction
  };
}

export function instructionLines(...lines: string[]): string {
  return lines.join("\n");
}

export function joinList(values: string[]): string {
  return values.join(", ");
}

/** Whole numbers keep one decimal place, so 20 renders as "20.0". */
export function formatDecimal(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}
