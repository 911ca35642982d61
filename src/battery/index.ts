/**
 * Battery runner: asks each question of a battery in order, one awaited
 * call at a time, and records a FieldOutcome per question. A failing
 * question never stops the ones after it.
 */

import { classifyCompletionError, type CompletionClient } from '../completion/index.js';
import { defaultMetrics, type Logger, type Metrics } from '../logging/index.js';
import type { BatteryAnswer, BatteryQuestion } from '../types/index.js';

export interface BatterySettings {
  system: string;
  maxTokens: number;
  temperature: number;
  /** Joins a question with the body it is asked about */
  composePrompt: (question: string, body: string) => string;
}

export async function runBattery<K extends string>(
  questions: ReadonlyArray<BatteryQuestion<K>>,
  body: string,
  client: CompletionClient,
  settings: BatterySettings,
  logger: Logger,
  metrics: Metrics = defaultMetrics
): Promise<Array<BatteryAnswer<K>>> {
  const answers: Array<BatteryAnswer<K>> = [];

  for (const question of questions) {
    try {
      const text = await client.complete({
        system: settings.system,
        prompt: settings.composePrompt(question.prompt, body),
        maxTokens: settings.maxTokens,
        temperature: settings.temperature,
      });
      answers.push({ key: question.key, outcome: { ok: true, value: text.trim() } });
    } catch (error) {
      const failure = classifyCompletionError(error);
      logger.warn('Battery question failed', { key: question.key, code: failure.code, error: failure.message });
      metrics.increment('battery.question_failed', { code: failure.code });
      answers.push({
        key: question.key,
        outcome: { ok: false, error: { code: failure.code, message: failure.message } },
      });
    }
  }

  return answers;
}
