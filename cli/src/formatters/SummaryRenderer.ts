/**
 * Rows of the step-summary table written by the action host.
 */

import { encodeScalar, type ResolutionOutcome } from '@pipevars/engine';

export interface SummaryCell {
  data: string;
  header?: boolean;
}

export type SummaryRow = Array<SummaryCell | string>;

export function renderSummaryRows(outcome: ResolutionOutcome): SummaryRow[] {
  const rows: SummaryRow[] = [[
    { data: 'Name', header: true },
    { data: 'Value', header: true },
    { data: 'Source', header: true },
  ]];

  for (const entry of outcome.resultSet.values()) {
    rows.push([entry.name, escapeCell(encodeScalar(entry.value)), entry.source]);
  }
  return rows;
}

/**
 * One-line text for the summary under the table
 */
export function renderSummaryFooter(outcome: ResolutionOutcome): string {
  const problems = outcome.diagnostics.length;
  const shadowed = outcome.projection.shadowed.length;
  const parts = [`${outcome.resultSet.size} variable(s) resolved for a ${outcome.trigger} run`];
  if (problems > 0) parts.push(`${problems} diagnostic(s)`);
  if (shadowed > 0) parts.push(`shadowed: ${outcome.projection.shadowed.join(', ')}`);
  return parts.join('; ');
}

function escapeCell(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}
