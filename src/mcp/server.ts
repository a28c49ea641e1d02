/**
 * Radar Timing MCP Server
 *
 * Model Context Protocol boundary for timing analyses. Controller programs
 * arrive as text; console scripts may still read the files they name through
 * source, loadfile, runexperiment and readfrequencyfile.
 *
 * Resources: the mnemonic table and the operator command catalog
 * Tools: replay a controller program, run a console script, look up mnemonics
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { errorMessage } from '../errors.js';
import { EROS_COMMANDS, createExperimentConsole } from '../eros/catalog.js';
import { formatSessionState } from '../eros/session.js';
import { analyzeProgram, formatSubcycle } from '../experiment.js';
import { configureLogger, loggers } from '../logger.js';
import { describeMnemonic, listMnemonics } from '../tarlan/mnemonics.js';
import { DEFAULT_CONFIG, parseRadarSite, type RadarSite } from '../types.js';

const log = loggers.mcp;

type ToolArguments = Record<string, unknown> | undefined;

export class ToolArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolArgumentError';
  }
}

function stringArgument(args: ToolArguments, name: string): string {
  const value = args?.[name];
  if (typeof value !== 'string' || value === '') {
    throw new ToolArgumentError(`${name} parameter required`);
  }
  return value;
}

function radarArgument(args: ToolArguments): RadarSite {
  const value = args?.radar;
  if (value === undefined) return DEFAULT_CONFIG.radar;
  const radar = typeof value === 'string' ? parseRadarSite(value) : null;
  if (radar === null) {
    throw new ToolArgumentError('radar must be one of UHF, VHF, ESR, KIR, SOD');
  }
  return radar;
}

function textResult(text: string) {
  return { content: [{ type: 'text' as const, text }] };
}

function jsonResource(uri: string, value: unknown) {
  return {
    contents: [
      {
        uri,
        mimeType: 'application/json',
        text: JSON.stringify(value, null, 2),
      },
    ],
  };
}

/**
 * Create and configure the MCP server
 */
export function createMCPServer(): Server {
  const server = new Server(
    {
      name: 'radar-timing',
      version: '0.4.0',
    },
    {
      capabilities: {
        resources: {},
        tools: {},
      },
    }
  );

  // ==========================================================================
  // RESOURCES
  // ==========================================================================

  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    return {
      resources: [
        {
          uri: 'timing://mnemonics',
          name: 'Controller Mnemonics',
          description: 'Every documented controller mnemonic with its description',
          mimeType: 'application/json',
        },
        {
          uri: 'timing://commands',
          name: 'Operator Commands',
          description: 'Operator commands understood in experiment scripts',
          mimeType: 'application/json',
        },
      ],
    };
  });

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const uri = request.params.uri;

    if (uri === 'timing://mnemonics') {
      return jsonResource(uri, Object.fromEntries(listMnemonics().map((name) => [name, describeMnemonic(name) ?? ''])));
    }
    if (uri === 'timing://commands') {
      return jsonResource(
        uri,
        Object.values(EROS_COMMANDS).map(({ name, description, category, stateful }) => ({
          name,
          description,
          category,
          stateful,
        }))
      );
    }
    throw new Error(`Unknown resource: ${uri}`);
  });

  // ==========================================================================
  // TOOLS
  // ==========================================================================

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: [
        {
          name: 'analyze_controller_program',
          description: 'Replay a controller program (AT/SETTCR/REP) and return the timeline of every subcycle.',
          inputSchema: {
            type: 'object',
            properties: {
              program: { type: 'string', description: 'Program text' },
              radar: { type: 'string', description: 'Radar site for the local oscillators (default UHF)' },
              format: { type: 'string', enum: ['json', 'text'], description: 'Output format (default json)' },
            },
            required: ['program'],
          },
        },
        {
          name: 'run_console_script',
          description: 'Run an experiment console script; returns its output and the receiver setup it leaves behind. The script may read files it names.',
          inputSchema: {
            type: 'object',
            properties: {
              script: { type: 'string', description: 'Script text' },
              radar: { type: 'string', description: 'Radar site (default UHF)' },
            },
            required: ['script'],
          },
        },
        {
          name: 'describe_mnemonic',
          description: 'Describe a controller mnemonic, or list the mnemonics starting with a prefix ending in *.',
          inputSchema: {
            type: 'object',
            properties: {
              mnemonic: { type: 'string', description: 'Mnemonic such as RFON, or a prefix such as CH*' },
            },
            required: ['mnemonic'],
          },
        },
      ],
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      switch (name) {
        case 'analyze_controller_program': {
          const radar = radarArgument(args);
          const experiment = analyzeProgram(stringArgument(args, 'program'), {
            radar,
            oscillators: DEFAULT_CONFIG.oscillators[radar],
            logger: log.child('tarlan'),
          });
          if (args?.format === 'text') {
            return textResult(experiment.subcycles.map(formatSubcycle).join('\n'));
          }
          return textResult(JSON.stringify(experiment.toJSON(), null, 2));
        }

        case 'run_console_script': {
          let output = '';
          const interp = createExperimentConsole({
            radar: radarArgument(args),
            output: (text) => {
              output += text;
            },
            logger: log.child('eros'),
          });
          const result = interp.evaluate(stringArgument(args, 'script'), 'script');
          const state = interp.root.state;
          return textResult(
            [
              output.trimEnd(),
              `Result: ${result}`,
              formatSessionState(state),
            ]
              .filter((part) => part !== '')
              .join('\n\n')
          );
        }

        case 'describe_mnemonic': {
          const mnemonic = stringArgument(args, 'mnemonic').toUpperCase();
          if (mnemonic.endsWith('*')) {
            const names = listMnemonics(mnemonic.slice(0, -1));
            return textResult(names.map((n) => `${n}: ${describeMnemonic(n) ?? ''}`).join('\n') || 'No mnemonics found');
          }
          const description = describeMnemonic(mnemonic);
          if (description === undefined) {
            return { isError: true, ...textResult(`Unknown mnemonic: ${mnemonic}`) };
          }
          return textResult(`${mnemonic}: ${description}`);
        }

        default:
          return { isError: true, ...textResult(`Unknown tool: ${name}`) };
      }
    } catch (error) {
      log.debug(`Tool ${name} failed: ${errorMessage(error)}`);
      return { isError: true, ...textResult(`Error: ${errorMessage(error)}`) };
    }
  });

  return server;
}

/**
 * Start MCP server with stdio transport
 */
export async function startMCPServer(): Promise<void> {
  // stdout carries the protocol
  configureLogger({ stream: 'stderr' });
  const server = createMCPServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info('Radar timing MCP server started on stdio');
}

// Run if executed directly
const isMain = import.meta.url === `file://${process.argv[1]}`;
if (isMain) {
  startMCPServer().catch((error) => {
    log.error(`Failed to start MCP server: ${errorMessage(error)}`);
    process.exit(1);
  });
}
