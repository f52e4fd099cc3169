import OpenAI from 'openai';
import { z } from 'zod';
import { logger } from '../logger.js';
import { AnalysisOutcome, AnalysisType, SchoolConfig } from '../types.js';
import { describeError } from '../utils.js';

export interface CompletionRequest {
  system: string;
  prompt: string;
  temperature: number;
}

/** A chat model that answers one system + user prompt pair with text. */
export interface AnalysisModel {
  complete(request: CompletionRequest): Promise<string>;
}

export class OpenAIAnalysisModel implements AnalysisModel {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(config: SchoolConfig['openai']) {
    this.client = new OpenAI({ apiKey: config.apiKey });
    this.model = config.model;
  }

  async complete({ system, prompt, temperature }: CompletionRequest): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: 'system', content: system },
        { role: 'user', content: prompt },
      ],
      temperature,
    });
    return response.choices[0]?.message?.content ?? '';
  }
}

const scalar = z.union([z.string(), z.number()]).transform(value => String(value));
const textField = (fallback: string) => scalar.catch(fallback);
const textList = z.array(scalar).catch([]);

const summarySchema = z.object({
  summary: textField('No summary available'),
  key_points: textList,
  important_dates: textList,
  action_items: textList,
});

const eventSchema = z.object({
  title: textField('Unknown Event'),
  date: textField('Unknown'),
  time: textField('Unknown'),
  location: textField('Unknown'),
  description: textField('No description'),
  supplies_needed: textField('None'),
  supplies_deadline: textField('Unknown'),
});

const eventsSchema = z
  .object({
    events_found: z.array(eventSchema).catch([]),
    total_events: z.number().int().nonnegative().optional().catch(undefined),
  })
  .transform(data => ({ events_found: data.events_found, total_events: data.total_events ?? data.events_found.length }));

const actionItemSchema = z.object({
  task: textField('Unknown task'),
  who: textField('Unknown'),
  deadline: textField('No deadline specified'),
  priority: z.string().transform(value => value.toLowerCase()).catch('medium'),
});

const actionItemsSchema = z
  .object({
    action_items: z.array(actionItemSchema).catch([]),
    total_items: z.number().int().nonnegative().optional().catch(undefined),
  })
  .transform(data => ({ action_items: data.action_items, total_items: data.total_items ?? data.action_items.length }));

interface AnalysisPrompt {
  system: string;
  temperature: number;
  build: (text: string) => string;
}

const PROMPTS: Record<AnalysisType, AnalysisPrompt> = {
  summary: {
    system:
      'You are an AI assistant that analyzes school announcements and documents. Always respond with valid JSON.',
    temperature: 0.3,
    build: text => `Please analyze this school announcement and provide:
1. A brief summary (2-3 sentences)
2. Key points (bullet list)
3. Important dates mentioned
4. Any action items for parents/students

Announcement text:
${text}

Please format your response as JSON with the following structure:
{
  "summary": "Brief summary here",
  "key_points": ["Point 1", "Point 2", "Point 3"],
  "important_dates": ["Date 1", "Date 2"],
  "action_items": ["Action 1", "Action 2"]
}`,
  },
  events: {
    system:
      'You are an AI assistant that extracts event information from school announcements. Focus only on events relevant to parents and students. Always respond with valid JSON.',
    temperature: 0.2,
    build: text => `Analyze this school announcement and extract any events or important dates.
For each event found, provide:
1. Event title/name
2. Date (if mentioned)
3. Time (if mentioned)
4. Location (if mentioned)
5. Description
6. Any supplies needed
7. Deadline for supplies (if mentioned)

Only extract actual events that parents/students need to know about.
Do NOT extract:
- Regular classroom lessons
- Internal assessments
- Administrative tasks
- General curriculum activities

Announcement text:
${text}

Please format your response as JSON:
{
  "events_found": [
    {
      "title": "Event name",
      "date": "YYYY-MM-DD or 'Unknown'",
      "time": "HH:MM or 'All day' or 'Unknown'",
      "location": "Location or 'Unknown'",
      "description": "Event description",
      "supplies_needed": "List of supplies or 'None'",
      "supplies_deadline": "YYYY-MM-DD or 'Unknown'"
    }
  ],
  "total_events": 0
}`,
  },
  action_items: {
    system:
      'You are an AI assistant that identifies action items and tasks from school announcements. Always respond with valid JSON.',
    temperature: 0.2,
    build: text => `Analyze this school announcement and extract any action items or tasks that parents/students need to do.

For each action item, provide:
1. What needs to be done
2. Who needs to do it (parents, students, or both)
3. Deadline (if mentioned)
4. Priority level (high, medium, low)

Examples of action items:
- Submit permission slips
- Bring supplies
- Register for events
- Complete forms
- Make payments

Announcement text:
${text}

Please format your response as JSON:
{
  "action_items": [
    {
      "task": "Description of what needs to be done",
      "who": "parents/students/both",
      "deadline": "YYYY-MM-DD or 'No deadline specified'",
      "priority": "high/medium/low"
    }
  ],
  "total_items": 0
}`,
  },
};

/** Models often wrap JSON in a ```json fence despite being asked not to. */
export function stripCodeFence(reply: string): string {
  const fenced = reply.trim().match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  return fenced ? fenced[1] : reply.trim();
}

function parseReply(reply: string): unknown {
  try {
    return JSON.parse(stripCodeFence(reply));
  } catch {
    return undefined;
  }
}

export class AiAnalysis {
  private readonly model: AnalysisModel;

  constructor(model: AnalysisModel) {
    this.model = model;
  }

  async analyzeDocument(text: string, analysisType: AnalysisType = 'summary'): Promise<AnalysisOutcome> {
    const prompt = PROMPTS[analysisType];
    let reply: string;
    try {
      reply = await this.model.complete({
        system: prompt.system,
        prompt: prompt.build(text),
        temperature: prompt.temperature,
      });
    } catch (error) {
      const message = describeError(error);
      logger.error(`Error in document analysis (${analysisType}): ${message}`);
      return { success: false, analysisType, error: message };
    }

    const json = parseReply(reply);
    const failure: AnalysisOutcome = {
      success: false,
      analysisType,
      error: 'Failed to parse AI response',
      rawResponse: reply,
    };
    if (json === undefined) {
      logger.error(`Failed to parse AI response as JSON (${analysisType})`);
      return failure;
    }

    switch (analysisType) {
      case 'summary': {
        const parsed = summarySchema.safeParse(json);
        return parsed.success ? { success: true, analysisType, result: parsed.data } : failure;
      }
      case 'events': {
        const parsed = eventsSchema.safeParse(json);
        return parsed.success ? { success: true, analysisType, result: parsed.data } : failure;
      }
      case 'action_items': {
        const parsed = actionItemsSchema.safeParse(json);
        return parsed.success ? { success: true, analysisType, result: parsed.data } : failure;
      }
    }
  }
}
