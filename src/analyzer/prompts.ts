export const REPORT_MARKER = '[RELATORIO]';
export const SUMMARY_MARKER = '[RESUMO]';

export const ANALYSIS_SYSTEM_PROMPT = `Você é um diretor de operações de vendas que audita conversas entre vendedores e clientes.
Seja direto e tático. Não invente fatos que não estejam na conversa ou no resumo anterior.`;

export const ANALYSIS_USER_TEMPLATE = `{context}VENDEDOR: {owner}
ARQUIVO: {filename}

Analise a conversa completa abaixo, com atenção ao que mudou desde o resumo anterior.
1. O cliente deu sinais de compra? (Score 0-100)
2. O vendedor cometeu algum erro grave nas mensagens novas?
3. Qual é a próxima mensagem exata que deve ser enviada?

Responda exatamente neste formato:
${REPORT_MARKER}
(feedback direto e tático para o vendedor)
${SUMMARY_MARKER}
(resumo técnico atualizado, um parágrafo, com o estado da negociação)

CONVERSA ATUALIZADA:
{text}`;

export interface AnalysisPromptInput {
  owner: string;
  filename: string;
  text: string;
  previousSummary: string | null;
}

export function buildAnalysisPrompt(input: AnalysisPromptInput): string {
  const context = input.previousSummary
    ? `O QUE JÁ SABEMOS:\n${input.previousSummary}\n\n`
    : '';
  const values: Record<string, string> = {
    context,
    owner: input.owner,
    filename: input.filename,
    text: input.text,
  };
  // Single pass, so placeholders inside substituted text stay literal
  return ANALYSIS_USER_TEMPLATE.replace(/\{(context|owner|filename|text)\}/g, (_, name: string) => values[name] ?? '');
}
