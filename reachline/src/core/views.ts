/**
 * Which accessibility column the map shows: the base skim, a named scenario,
 * or the scenario-minus-base difference.
 */

export type AnalysisView =
  | { kind: 'base' }
  | { kind: 'scenario'; name: string }
  | { kind: 'difference' };

export const BASE_VIEW: AnalysisView = { kind: 'base' };
export const DIFFERENCE_VIEW: AnalysisView = { kind: 'difference' };

const BASE_LABEL = 'Base Scenario';
const DIFFERENCE_LABEL = 'Difference';

export interface ViewValues {
  accessA: number;
  accessB?: number;
  delta?: number;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled view: ${JSON.stringify(value)}`);
}

/**
 * The value a view reads from a row. Falls back to the base value when the
 * row carries no scenario data.
 */
export function viewValue(row: ViewValues, view: AnalysisView): number {
  switch (view.kind) {
    case 'base':
      return row.accessA;
    case 'scenario':
      return row.accessB ?? row.accessA;
    case 'difference':
      return row.delta ?? row.accessA;
    default:
      return assertNever(view);
  }
}

export function viewLabel(view: AnalysisView): string {
  switch (view.kind) {
    case 'base':
      return BASE_LABEL;
    case 'scenario':
      return view.name;
    case 'difference':
      return DIFFERENCE_LABEL;
    default:
      return assertNever(view);
  }
}

export function viewTitle(view: AnalysisView, attributeLabel: string): string {
  switch (view.kind) {
    case 'base':
      return `${attributeLabel} Accessibility (Base)`;
    case 'scenario':
      return `${attributeLabel} Accessibility (${view.name})`;
    case 'difference':
      return `Change in ${attributeLabel} Accessibility`;
    default:
      return assertNever(view);
  }
}

/**
 * Parse a selector label. Anything other than the base and difference labels
 * names a scenario.
 */
export function parseView(text: string): AnalysisView {
  const trimmed = text.trim();
  if (trimmed === '' || trimmed === BASE_LABEL || trimmed.toLowerCase() === 'base') {
    return BASE_VIEW;
  }
  if (trimmed === DIFFERENCE_LABEL || trimmed.toLowerCase() === 'difference') {
    return DIFFERENCE_VIEW;
  }
  return { kind: 'scenario', name: trimmed };
}
