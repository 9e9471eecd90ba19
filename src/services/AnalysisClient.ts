/**
 * Question/answer analysis of one chat window.
 * Builds the prompt, calls the analysis provider with bounded retries for
 * rate limits and transient failures, and returns a validated result.
 */

import type { IAnalysisProvider } from '../providers/IAnalysisProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { AnalysisResult, Message } from '../types/models.js';
import type { RunOptions, Sleep } from '../types/common.js';
import { errorMessage } from '../errors.js';
import { retryWithBackoff, type RetryPolicy } from '../utils/retry.js';
import { AnalysisResultParser } from './AnalysisResultParser.js';

export const EMPTY_ANALYSIS: AnalysisResult = {
  questions: [],
  answers: [],
  summary: { totalQuestions: 0, answered: 0, unanswered: 0, avgResponseTimeMinutes: null },
};

export class AnalysisClient {
  private readonly parser = new AnalysisResultParser();

  constructor(
    private readonly provider: IAnalysisProvider,
    private readonly logger: ILogProvider,
    private readonly retryPolicy: RetryPolicy,
    private readonly sleep: Sleep
  ) {}

  async analyze(messages: Message[], options?: RunOptions): Promise<AnalysisResult> {
    if (messages.length === 0) return EMPTY_ANALYSIS;

    const prompt = buildAnalysisPrompt(messages);
    const chatId = messages[0].chatId;

    const raw = await retryWithBackoff(
      () => this.provider.complete(prompt, { signal: options?.signal }),
      {
        policy: this.retryPolicy,
        sleep: this.sleep,
        signal: options?.signal,
        onRetry: (err, attempt, delayMs) => {
          this.logger.warn('Analysis call failed, retrying', {
            chatId,
            provider: this.provider.name,
            attempt,
            delayMs,
            error: errorMessage(err),
          });
        },
      }
    );

    this.logger.debug('Analysis response received', {
      chatId,
      provider: this.provider.name,
      length: raw.length,
    });

    // Malformed output is a data-quality failure: no retry.
    const result = this.parser.parse(raw, messages);

    this.logger.info('Analysis complete', {
      chatId,
      messages: messages.length,
      questions: result.summary.totalQuestions,
      answered: result.summary.answered,
      unanswered: result.summary.unanswered,
    });
    return result;
  }
}

/**
 * One request covering the whole window. Lines keep the window order, which
 * is why MessageStore sorts deterministically.
 */
export function buildAnalysisPrompt(messages: Message[]): string {
  const lines = messages.map((msg) => {
    const sender = msg.userName || `User ${msg.userId}`;
    return `[${formatTimestamp(msg.sentAt)}] ${sender} (ID: ${msg.messageId}): ${msg.text}`;
  });

  return `Analyze the following group chat messages and identify:

1. Questions: messages that ask for information or clarification.
   - Categorize each as technical, business, or other.
   - Exclude rhetorical questions and pleasantries.
2. Answers: messages that respond to a question.
   - Map each answer to the question it addresses by message ID.
   - If a question has several answers, use the earliest substantive one.
3. Summary: total questions, answered and unanswered counts, average response time.

Messages (timestamps are UTC):
${lines.join('\n')}

Respond with ONLY valid JSON in exactly this shape:
{
  "questions": [
    {
      "message_id": 123,
      "text": "question text",
      "category": "technical|business|other",
      "is_answered": true,
      "answer_message_id": 124,
      "response_time_minutes": 15.5
    }
  ],
  "answers": [
    { "message_id": 124, "text": "answer text", "answers_to_message_id": 123 }
  ],
  "summary": {
    "total_questions": 1,
    "answered": 1,
    "unanswered": 0,
    "avg_response_time_minutes": 15.5
  }
}

For an unanswered question set "is_answered": false, "answer_message_id": null and "response_time_minutes": null.`;
}

function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}
