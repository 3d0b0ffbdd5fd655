import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { CalculatorToolSurface } from '../tools/calculator-tools.js';

export const SERVER_INFO = { name: 'calc-pilot', version: '0.1.0' };

export const TOOL_DEFINITIONS: Tool[] = [
  {
    name: 'open_calculator',
    description: 'Opens the calculator application, or finds it if it is already running',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'execute_calculation',
    description:
      "Executes a natural language calculation instruction (e.g. 'Add 2 and 3 and then find the square of the result')",
    inputSchema: {
      type: 'object',
      properties: {
        instruction: { type: 'string', description: 'Natural language instruction for the calculation' },
      },
      required: ['instruction'],
    },
  },
  {
    name: 'click_button',
    description: 'Clicks a single calculator button',
    inputSchema: {
      type: 'object',
      properties: {
        button: { type: 'string', description: "Button name (e.g. '2', '+', '=', 'square')" },
      },
      required: ['button'],
    },
  },
];

const InstructionArgsSchema = z.object({ instruction: z.string().trim().min(1) });
const ButtonArgsSchema = z.object({ button: z.string().trim().min(1) });

export async function handleToolCall(
  tools: CalculatorToolSurface,
  name: string,
  args: Record<string, unknown> = {},
  signal?: AbortSignal,
): Promise<CallToolResult> {
  switch (name) {
    case 'open_calculator': {
      const result = await tools.openApplication();
      return toolResult(result, !result.success);
    }
    case 'execute_calculation': {
      const parsed = InstructionArgsSchema.safeParse(args);
      if (!parsed.success) return toolResult({ success: false, error: 'No instruction provided' }, true);
      const result = await tools.runInstruction(parsed.data.instruction, { signal });
      return toolResult({ instruction: parsed.data.instruction, ...result }, !result.success);
    }
    case 'click_button': {
      const parsed = ButtonArgsSchema.safeParse(args);
      if (!parsed.success) return toolResult({ success: false, error: 'No button provided' }, true);
      const result = await tools.pressButton(parsed.data.button, { signal });
      return toolResult(result, !result.success);
    }
    default:
      return toolResult({ success: false, error: `Unknown tool: ${name}` }, true);
  }
}

export function createCalculatorServer(tools: CalculatorToolSurface): Server {
  const server = new Server(SERVER_INFO, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOL_DEFINITIONS }));
  // A cancelled request stops the press sequence before its next click.
  server.setRequestHandler(CallToolRequestSchema, async (request, extra) =>
    handleToolCall(tools, request.params.name, request.params.arguments, extra.signal),
  );

  return server;
}

function toolResult(payload: unknown, isError: boolean): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
    isError,
  };
}
