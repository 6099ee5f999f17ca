/**
 * Shared CLI rendering for plans and fleet reports
 */

import type { FleetPlan } from '@/types';
import type { FleetRunReport } from '@/app';
import { renderPipelineYaml, toPipelineSteps } from '@/app/fleet-matrix';

export type PlanFormat = 'yaml' | 'json';

export function isPlanFormat(value: string): value is PlanFormat {
  return value === 'yaml' || value === 'json';
}

/**
 * Render a fleet plan in the specified format
 */
export function renderPlan(plan: FleetPlan, format: PlanFormat): string {
  switch (format) {
    case 'yaml':
      return renderPipelineYaml(plan).trimEnd();
    case 'json':
      return JSON.stringify(toPipelineSteps(plan), null, 2);
  }
}

export function renderFleetReport(report: FleetRunReport): string {
  if (report.outcomes.length === 0) {
    return 'No tools in roster';
  }

  // Calculate column widths
  const toolWidth = Math.max(4, ...report.outcomes.map((o) => o.tool.length));
  const stateWidth = Math.max(5, ...report.outcomes.map((o) => o.state.length));

  const lines = [
    `${'TOOL'.padEnd(toolWidth)}  ${'STATE'.padEnd(stateWidth)}  DETAIL`,
    ...report.outcomes.map((o) =>
      `${o.tool.padEnd(toolWidth)}  ${o.state.padEnd(stateWidth)}  ${o.detail ?? ''}`.trimEnd(),
    ),
  ];
  if (report.cancelled) {
    lines.push('', 'fleet run interrupted; remaining tools were cancelled');
  }
  return lines.join('\n');
}
