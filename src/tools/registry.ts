import type { RegisteredTool } from "../types/tool.js";
import { OPERATION_RISK } from "../types/risk.js";
import type { OperationName } from "../types/operation.js";

const OPERATION_TOOL = /^bmc_(.+)$/;

function isOperationName(name: string): name is OperationName {
  return Object.prototype.hasOwnProperty.call(OPERATION_RISK, name);
}

/**
 * The fixed bmc tool set, in registration order. Registering a name twice is a
 * wiring bug. A tool named after an operation (bmc_<operation>) must declare
 * that operation's risk level, so MCP clients see the same risk the safety gate enforces.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  register(tool: RegisteredTool): void {
    const { name, riskLevel } = tool.metadata;
    if (this.tools.has(name)) {
      throw new Error(`Tool ${name} is already registered`);
    }
    const operation = OPERATION_TOOL.exec(name)?.[1];
    if (operation !== undefined && isOperationName(operation) && OPERATION_RISK[operation] !== riskLevel) {
      throw new Error(`Tool ${name} declares risk ${riskLevel}, but ${operation} is ${OPERATION_RISK[operation]}`);
    }
    this.tools.set(name, tool);
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  list(): RegisteredTool[] {
    return [...this.tools.values()];
  }

  get size(): number {
    return this.tools.size;
  }
}
