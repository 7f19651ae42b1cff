import { ParseError, describeError } from '../errors.js';
import { formatEvent, type Logger } from '../log.js';
import type { ChatModel } from './llm.js';
import {
  ANALYSIS_SYSTEM_PROMPT,
  REPORT_MARKER,
  SUMMARY_MARKER,
  buildAnalysisPrompt,
  type AnalysisPromptInput,
} from './prompts.js';

export const SUMMARY_PLACEHOLDER = 'Resumo mantido.';
export const EMPTY_REPORT_PLACEHOLDER = 'Relatório vazio.';
export const FAILED_REPORT_PLACEHOLDER = 'Erro na análise.';

export interface AnalysisResult {
  report: string;
  summary: string;
  /** The model call failed; `report` is a placeholder and `summary` is the prior one. */
  degraded: boolean;
  /** The response had no summary section; `summary` fell back to the prior one. */
  parseFallback: boolean;
}

export type AnalysisInput = AnalysisPromptInput;

/**
 * Split a model response on the summary marker. Throws `ParseError` when the
 * summary section is missing or empty.
 */
export function splitSections(content: string): { report: string; summary: string } {
  const at = content.indexOf(SUMMARY_MARKER);
  if (at === -1) {
    throw new ParseError(`Response has no ${SUMMARY_MARKER} section`);
  }
  const summary = content.slice(at + SUMMARY_MARKER.length).trim();
  if (!summary) {
    throw new ParseError(`Response has an empty ${SUMMARY_MARKER} section`);
  }
  return { report: cleanReport(content.slice(0, at)), summary };
}

function cleanReport(text: string): string {
  return text.replace(REPORT_MARKER, '').trim() || EMPTY_REPORT_PLACEHOLDER;
}

/**
 * Like `splitSections`, but the summary never regresses to empty: on a parse
 * failure it falls back to the previous summary, then to a placeholder, and
 * the whole response (minus the report marker) becomes the report.
 */
export function parseAnalysis(
  content: string,
  previousSummary: string | null,
): Pick<AnalysisResult, 'report' | 'summary' | 'parseFallback'> {
  try {
    return { ...splitSections(content), parseFallback: false };
  } catch (err) {
    if (!(err instanceof ParseError)) throw err;
    const at = content.indexOf(SUMMARY_MARKER);
    return {
      report: cleanReport(at === -1 ? content : content.slice(0, at)),
      summary: previousSummary && previousSummary.trim() ? previousSummary : SUMMARY_PLACEHOLDER,
      parseFallback: true,
    };
  }
}

export class Analyzer {
  constructor(
    private model: ChatModel,
    private logger: Logger = console,
  ) {}

  async analyze(input: AnalysisInput): Promise<AnalysisResult> {
    let content: string;
    try {
      content = await this.model.complete(ANALYSIS_SYSTEM_PROMPT, buildAnalysisPrompt(input));
    } catch (err) {
      this.logger.error(formatEvent('analysis.failed', {
        owner: input.owner,
        file: input.filename,
        model: this.model.model,
        error: describeError(err),
      }));
      return {
        report: FAILED_REPORT_PLACEHOLDER,
        summary: input.previousSummary ?? SUMMARY_PLACEHOLDER,
        degraded: true,
        parseFallback: false,
      };
    }

    const parsed = parseAnalysis(content, input.previousSummary);
    if (parsed.parseFallback) {
      this.logger.warn(formatEvent('analysis.parse_fallback', {
        owner: input.owner,
        file: input.filename,
        marker: SUMMARY_MARKER,
      }));
    }
    return { ...parsed, degraded: false };
  }
}
