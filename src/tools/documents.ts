import { AiAnalysis } from '../api/analysisClient.js';
import { logger } from '../logger.js';
import { ActionItemExtraction, AnalysisType, DocumentSummary, EventExtraction } from '../types.js';

export const ANALYSIS_TYPES = ['summary', 'events', 'action_items'] as const satisfies readonly AnalysisType[];
export const MIN_DOCUMENT_LENGTH = 10;
export const MAX_DOCUMENT_LENGTH = 10000;

const PRIORITY_LABELS: Record<string, string> = {
  high: 'HIGH',
  medium: 'MEDIUM',
  low: 'LOW',
};

const capitalize = (value: string) => (value ? value[0].toUpperCase() + value.slice(1) : value);

export function formatSummary(data: DocumentSummary): string {
  const sections = ['Document Summary', `Summary: ${data.summary}`];
  if (data.key_points.length > 0) {
    sections.push(['Key Points:', ...data.key_points.map((point, i) => `${i + 1}. ${point}`)].join('\n'));
  }
  if (data.important_dates.length > 0) {
    sections.push(['Important Dates:', ...data.important_dates.map(date => `- ${date}`)].join('\n'));
  }
  if (data.action_items.length > 0) {
    sections.push(['Action Items:', ...data.action_items.map((item, i) => `${i + 1}. ${item}`)].join('\n'));
  }
  return sections.join('\n\n');
}

export function formatEvents(data: EventExtraction): string {
  if (data.events_found.length === 0) {
    return 'Event Analysis\n\nNo events found in the document.';
  }
  const blocks = data.events_found.map((event, i) => {
    const lines = [
      `Event ${i + 1}: ${event.title}`,
      `Date: ${event.date}`,
      `Time: ${event.time}`,
      `Location: ${event.location}`,
      `Description: ${event.description}`,
    ];
    if (event.supplies_needed && event.supplies_needed !== 'None') {
      lines.push(`Supplies Needed: ${event.supplies_needed}`);
      if (event.supplies_deadline && event.supplies_deadline !== 'Unknown') {
        lines.push(`Supplies Deadline: ${event.supplies_deadline}`);
      }
    }
    return lines.join('\n');
  });
  return `Event Analysis\n\nFound ${data.total_events} event(s):\n\n${blocks.join('\n\n')}`;
}

export function formatActionItems(data: ActionItemExtraction): string {
  if (data.action_items.length === 0) {
    return 'Action Items Analysis\n\nNo action items found in the document.';
  }
  const blocks = data.action_items.map((item, i) =>
    [
      `${i + 1}. ${item.task} [${PRIORITY_LABELS[item.priority] ?? item.priority.toUpperCase()}]`,
      `Who: ${item.who}`,
      `Deadline: ${item.deadline}`,
      `Priority: ${capitalize(item.priority)}`,
    ].join('\n')
  );
  return `Action Items Analysis\n\nFound ${data.total_items} action item(s):\n\n${blocks.join('\n\n')}`;
}

/**
 * Run one kind of AI analysis over a document and render the result as text.
 */
export async function analyzeDocument(analysis: AiAnalysis, text: string, analysisType: AnalysisType): Promise<string> {
  logger.info(`Analyzing document with type: ${analysisType}`);

  if (!text || text.trim().length < MIN_DOCUMENT_LENGTH) {
    return 'Error: Document text is too short for meaningful analysis.';
  }
  let document = text;
  if (document.length > MAX_DOCUMENT_LENGTH) {
    document = `${document.substring(0, MAX_DOCUMENT_LENGTH)}... [truncated]`;
    logger.warn(`Document text truncated to ${MAX_DOCUMENT_LENGTH} characters`);
  }

  const outcome = await analysis.analyzeDocument(document, analysisType);
  if (!outcome.success) {
    return `Analysis failed: ${outcome.error}`;
  }
  switch (outcome.analysisType) {
    case 'summary':
      return formatSummary(outcome.result);
    case 'events':
      return formatEvents(outcome.result);
    case 'action_items':
      return formatActionItems(outcome.result);
  }
}
