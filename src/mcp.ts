#!/usr/bin/env node
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { loadConfig } from './core/config.js';
import { errorMessage } from './core/errors.js';
import { createLogger } from './core/logger.js';
import { openDb } from './infra/db.js';
import { ReloadHistory } from './core/history.js';

const cfg = loadConfig(process.env);
// stdout belongs to the MCP transport
const log = createLogger({ logLevel: 'silent' });
const db = openDb(cfg.historyPath);
const history = new ReloadHistory(db, log);

const server = new Server(
  {
    name: 'hotloop',
    version: '0.1.0'
  },
  {
    capabilities: {
      tools: {},
      resources: {}
    }
  }
);

// Tool input schemas
const HistoryInput = z.object({
  limit: z.number().int().min(1).max(500).default(20).optional().describe('Max cycles to return'),
  outcome: z.enum(['success', 'failure']).optional().describe('Only cycles with this outcome')
});

const CycleGetInput = z.object({
  cycleId: z.string().min(4).describe('Cycle ID')
});

function text(value: unknown) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }] };
}

server.setRequestHandler(ListToolsRequestSchema, async () => {
  return {
    tools: [
      {
        name: 'hotloop_status',
        description:
          'Get hot reload history status: number of compile cycles, failures, and the last revision that reloaded successfully.',
        inputSchema: {
          type: 'object',
          properties: {},
          required: []
        }
      },
      {
        name: 'hotloop_history',
        description:
          'List recent compile cycles (newest first) with changed paths, recompiled count, duration and diagnostics. Filter by outcome to find broken builds.',
        inputSchema: {
          type: 'object',
          properties: {
            limit: { type: 'number', description: 'Max cycles to return (1-500, default 20)' },
            outcome: { type: 'string', enum: ['success', 'failure'], description: 'Only cycles with this outcome' }
          },
          required: []
        }
      },
      {
        name: 'hotloop_cycle_get',
        description: 'Get one compile cycle by ID, including every diagnostic it produced.',
        inputSchema: {
          type: 'object',
          properties: {
            cycleId: { type: 'string', description: 'Cycle ID' }
          },
          required: ['cycleId']
        }
      }
    ]
  };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;

  try {
    switch (name) {
      case 'hotloop_status':
        return text(history.status());

      case 'hotloop_history': {
        const input = HistoryInput.parse(args ?? {});
        const cycles = history.listCycles(input.limit ?? 20, input.outcome);
        return text({ count: cycles.length, cycles });
      }

      case 'hotloop_cycle_get': {
        const input = CycleGetInput.parse(args);
        const cycle = history.getCycle(input.cycleId);
        if (!cycle) {
          return {
            content: [{ type: 'text', text: `Cycle not found: ${input.cycleId}` }],
            isError: true
          };
        }
        return text(cycle);
      }

      default:
        return {
          content: [{ type: 'text', text: `Unknown tool: ${name}` }],
          isError: true
        };
    }
  } catch (err) {
    return {
      content: [{ type: 'text', text: `Error: ${errorMessage(err)}` }],
      isError: true
    };
  }
});

server.setRequestHandler(ListResourcesRequestSchema, async () => {
  return {
    resources: [
      {
        uri: 'hotloop://status',
        name: 'Hot reload status',
        description: 'Reload history counts and last good revision',
        mimeType: 'application/json'
      }
    ]
  };
});

server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
  const { uri } = request.params;

  if (uri === 'hotloop://status') {
    return {
      contents: [
        {
          uri,
          mimeType: 'application/json',
          text: JSON.stringify(history.status(), null, 2)
        }
      ]
    };
  }

  throw new Error(`Unknown resource: ${uri}`);
});

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((err) => {
  console.error('hotloop MCP server error:', err);
  process.exit(1);
});
