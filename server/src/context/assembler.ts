import { contentAllowance, type AssembledContext, type ContextBudget, type FetchedFile } from './types.js';

export function sectionLabel(file: FetchedFile): string {
  return file.truncated ? `=== ${file.path} (truncated) ===` : `=== ${file.path} ===`;
}

/**
 * Concatenate fetched files in order until the budget is spent. The first
 * file that does not fit is cut to exactly the remaining allowance and ends
 * assembly; later, smaller files are not considered.
 */
export function assembleContext(fetched: readonly FetchedFile[], budget: ContextBudget): AssembledContext {
  const allowance = contentAllowance(budget);
  const includedFiles: FetchedFile[] = [];
  const sections: string[] = [];

  for (const file of fetched) {
    const remaining = allowance - budget.used;
    if (remaining <= 0) break;

    const capped = file.content.length > budget.perFileCap;
    const content = capped ? file.content.slice(0, budget.perFileCap) : file.content;

    if (content.length <= remaining) {
      const included: FetchedFile = {
        path: file.path,
        content,
        truncated: false,
        capped: file.capped || capped,
        bytesUsed: content.length,
      };
      includedFiles.push(included);
      sections.push(`${sectionLabel(included)}\n${content}`);
      budget.used += content.length;
      continue;
    }

    const partial: FetchedFile = {
      path: file.path,
      content: content.slice(0, remaining),
      truncated: true,
      capped: file.capped || capped,
      bytesUsed: remaining,
    };
    includedFiles.push(partial);
    sections.push(`${sectionLabel(partial)}\n${partial.content}`);
    budget.used = allowance;
    break;
  }

  return {
    blob: sections.join('\n\n'),
    includedFiles,
    totalBytesUsed: budget.used,
  };
}
