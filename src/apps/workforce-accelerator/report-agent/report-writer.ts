/**
 * OpenAI-backed report writer. Asks for a JSON object and validates it
 * before anything is stored.
 */
import OpenAI from 'openai';
import { ProviderError, toError } from '@/core/errors.js';
import type { Logger } from '@/observability/logger.js';
import { periodLabel } from './periods.js';
import { reportTextSchema } from './types.js';
import type { AgentReportMetrics, ReportText, ReportWriter, TeamReportMetrics } from './types.js';

export interface OpenAIReportWriterOptions {
  apiKey: string;
  model: string;
  logger: Logger;
  baseUrl?: string;
}

// ─── Prompt Building ────────────────────────────────────────────

function percentage(part: number, whole: number): number {
  return whole === 0 ? 0 : Math.round((part / whole) * 100);
}

function listOrNone(lines: string[], none: string): string {
  return lines.length > 0 ? lines.join('\n') : none;
}

/** `9.5 seconds`, `2.0 minutes`, `1.3 hours`. */
export function formatDuration(ms: number): string {
  const seconds = ms / 1000;
  if (seconds > 3600) return `${(seconds / 3600).toFixed(1)} hours`;
  if (seconds > 60) return `${(seconds / 60).toFixed(1)} minutes`;
  return `${seconds.toFixed(1)} seconds`;
}

export function buildTeamPrompt(metrics: TeamReportMetrics, orgName: string): string {
  const performers = metrics.topPerformers.map(
    (p) => `- ${p.name}: ${p.activityCount} activities, ${p.agentsUsed.length} agents used`,
  );
  const agents = Object.entries(metrics.agentsAccessed).map(
    ([agent, users]) => `- ${agent}: ${users} members`,
  );

  return [
    `Team activity report for "${orgName}".`,
    `Period: ${periodLabel(metrics)}`,
    '',
    `Members: ${metrics.totalMembers}`,
    `Active members: ${metrics.activeMembers} (${percentage(metrics.activeMembers, metrics.totalMembers)}% engagement)`,
    `Activities: ${metrics.totalActivities}`,
    `Activities by type: ${JSON.stringify(metrics.activitiesByType)}`,
    '',
    'Top performers:',
    listOrNone(performers, 'none'),
    '',
    'Agent usage:',
    listOrNone(agents, 'none'),
    '',
    'Write a two to three paragraph summary of engagement, leading contributors and the agents in use.',
    'Add three to five short highlights and any recommendations.',
    'Reply with a JSON object: {"summary_text": string, "highlights": string[], "recommendations": string[]}.',
  ].join('\n');
}

export function buildAgentPrompt(metrics: AgentReportMetrics, orgName: string): string {
  const tasks = Object.entries(metrics.tasksByType).map(([type, count]) => `- ${type}: ${count}`);
  const notable = metrics.highlights.slice(0, 5).map((h) => `- ${h.description}`);

  return [
    `Agent performance report for "${orgName}".`,
    `Agent: ${metrics.agentName}`,
    `Period: ${periodLabel(metrics)}`,
    '',
    `Tasks completed: ${metrics.totalTasks}`,
    `Members using the agent: ${metrics.uniqueUsers}`,
    `Processing time: ${formatDuration(metrics.totalExecutionTimeMs)}`,
    `Tokens used: ${metrics.totalTokensUsed.toLocaleString('en-US')}`,
    '',
    'Tasks by type:',
    listOrNone(tasks, 'none'),
    '',
    'Notable work:',
    listOrNone(notable, 'none'),
    '',
    'Write a two to three paragraph summary of the work the agent did and the time it saved.',
    'Add three to five short highlights.',
    'Reply with a JSON object: {"summary_text": string, "highlights": string[]}.',
  ].join('\n');
}

const SYSTEM_PROMPT =
  'You write factual business activity reports for team leads. Respond only with valid JSON.';

// ─── Factory ────────────────────────────────────────────────────

export function createOpenAIReportWriter(options: OpenAIReportWriterOptions): ReportWriter {
  const { model, logger } = options;
  const client = new OpenAI({
    apiKey: options.apiKey,
    ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
  });

  async function complete(prompt: string, maxTokens: number): Promise<ReportText> {
    let completion: OpenAI.Chat.Completions.ChatCompletion;
    try {
      completion = await client.chat.completions.create({
        model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: prompt },
        ],
        response_format: { type: 'json_object' },
        temperature: 0.7,
        max_tokens: maxTokens,
      });
    } catch (error) {
      const cause = toError(error);
      throw new ProviderError('openai', cause.message, cause);
    }

    const content = completion.choices[0]?.message.content;
    if (!content) {
      throw new ProviderError('openai', 'Empty completion');
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      throw new ProviderError('openai', 'Completion is not valid JSON', toError(error));
    }

    const parsed = reportTextSchema.safeParse(json);
    if (!parsed.success) {
      throw new ProviderError('openai', `Completion has the wrong shape: ${parsed.error.message}`);
    }

    logger.debug('Report text generated', {
      component: 'report-writer',
      model,
      tokensUsed: completion.usage?.total_tokens,
    });

    return {
      summaryText: parsed.data.summary_text,
      highlights: parsed.data.highlights,
      recommendations: parsed.data.recommendations,
      tokensUsed: completion.usage?.total_tokens,
    };
  }

  return {
    model,
    writeTeamReport: (metrics, orgName) => complete(buildTeamPrompt(metrics, orgName), 800),
    writeAgentReport: (metrics, orgName) => complete(buildAgentPrompt(metrics, orgName), 600),
  };
}
