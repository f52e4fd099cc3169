import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListPromptsRequestSchema,
  GetPromptRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type { GetPromptResult } from '@modelcontextprotocol/sdk/types.js';
import { logger } from './logger.js';
import { SchoolTools } from './schoolTools.js';
import { tools, Tool } from './tools/index.js';
import { SchoolConfig, ToolResult } from './types.js';
import { describeError } from './utils.js';

type PromptResult = GetPromptResult;

export const SERVER_NAME = 'schoolconnect-mcp-server';
export const SERVER_VERSION = '1.0.0';

export const PROMPTS = [
  {
    name: 'weekly-announcement-digest',
    description: "Summarize this week's school announcements and what needs attention",
    arguments: [],
  },
  {
    name: 'plan-from-announcement',
    description: 'Find an announcement, extract its events and put them on the calendar with reminders',
    arguments: [
      {
        name: 'topic',
        description: "What the announcement is about (e.g., 'field trip', 'book fair')",
        required: true,
      },
    ],
  },
  {
    name: 'announcements-from-sender',
    description: 'Review everything a teacher or staff member has sent',
    arguments: [
      {
        name: 'sender',
        description: 'Name of the sender (e.g., Jessica)',
        required: true,
      },
      {
        name: 'dateRange',
        description: "Optional natural-language date range (e.g., 'last week', 'in May')",
        required: false,
      },
    ],
  },
];

const userMessage = (text: string): PromptResult => ({
  messages: [{ role: 'user', content: { type: 'text', text } }],
});

const errorResult = (text: string): ToolResult => ({ content: [{ type: 'text', text }], isError: true });

// Exposes the school announcement, calendar and analysis tools over the Model Context Protocol
export class SchoolServer {
  private server: Server;
  private schoolTools: SchoolTools;
  private tools: Tool[];

  constructor(config: SchoolConfig, schoolTools?: SchoolTools) {
    this.server = new Server(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
          prompts: {},
        },
      }
    );

    this.schoolTools = schoolTools ?? SchoolTools.fromConfig(config);
    this.tools = tools;

    this.setupRequestHandlers();
  }

  private setupRequestHandlers() {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      logger.info('Received ListToolsRequest');
      return { tools: this.listTools() };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async request => {
      const { name, arguments: args } = request.params;
      return this.handleCallTool(name, args);
    });

    this.server.setRequestHandler(ListPromptsRequestSchema, async () => {
      return { prompts: PROMPTS };
    });

    this.server.setRequestHandler(GetPromptRequestSchema, async (request): Promise<PromptResult> => {
      return this.getPrompt(request.params.name, request.params.arguments);
    });
  }

  listTools() {
    return this.tools.map(({ name, description, inputSchema }) => ({ name, description, inputSchema }));
  }

  async handleCallTool(name: string, args: Record<string, unknown> | undefined): Promise<ToolResult> {
    logger.info(`Received CallToolRequest for: ${name} with args: ${JSON.stringify(args ?? {})}`);

    const tool = this.tools.find(t => t.name === name);
    if (!tool) {
      logger.warn(`Unknown tool requested: ${name}`);
      return errorResult(`Unknown tool: ${name}`);
    }

    try {
      return await tool.execute(args ?? {}, { schoolTools: this.schoolTools });
    } catch (error: unknown) {
      const message = describeError(error);
      logger.error(`Error executing tool '${name}': ${message}`);
      return errorResult(`Error executing ${name}: ${message}`);
    }
  }

  getPrompt(name: string, args: Record<string, string> | undefined): PromptResult {
    if (name === 'weekly-announcement-digest') {
      return userMessage(`Please give me a digest of this week's school announcements. Follow these steps:

1. Use the get_announcements_by_date tool with date_query "this week" to fetch this week's announcements.

2. For any announcement that mentions an event, deadline, or request, use the summarize_announcement tool on its description.

3. Organize the digest into:
   - Upcoming events with their dates
   - Things parents or students need to do, with deadlines
   - General information worth knowing

4. Finish with a short list of the items that need attention soonest.

Please keep the digest brief and easy to scan.`);
    }

    if (name === 'plan-from-announcement') {
      const topic = args?.topic ?? '';
      return userMessage(`Please help me plan around the announcement about "${topic}". Follow these steps:

1. Use the search_announcements tool with query "${topic}" to find the announcement.

2. Take the most relevant result and use the extract_events tool on its description.

3. For each event that has a concrete date:
   - Use the create_event_with_reminder tool to add it to the calendar
   - Use the event's time if one was found, otherwise let the event type be detected automatically
   - Mention supplies or deadlines in the event description

4. Use the extract_action_items tool on the same text and list anything I need to do.

5. Summarize which calendar entries and reminders were created, and which events could not be scheduled.`);
    }

    if (name === 'announcements-from-sender') {
      const sender = args?.sender ?? '';
      const dateRange = args?.dateRange?.trim();
      const scope = dateRange ? ` from ${dateRange}` : '';
      const dateStep = dateRange ? ` and date_filter "${dateRange}"` : '';
      return userMessage(`Please review the announcements sent by ${sender}${scope}. Follow these steps:

1. Use the search_announcements tool with an empty query, sender "${sender}"${dateStep}.

2. Group the results by subject and list them newest first.

3. Point out any events, deadlines, or requests in these announcements.

Please present the results in a clear, organized format.`);
    }

    logger.warn(`Unknown prompt requested: ${name}`);
    return { messages: [] };
  }

  public async start() {
    const transport = new StdioServerTransport();
    logger.info('Attempting to connect server to stdio transport...');
    try {
      await this.server.connect(transport);
      logger.info('SchoolConnect MCP Server successfully connected and running on stdio');
    } catch (error: unknown) {
      logger.error(`Error connecting server to stdio transport: ${describeError(error)}`);
      throw error;
    }
  }
}
