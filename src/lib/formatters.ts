export interface ReportFormatter {
  readonly name: string;
  format(report: unknown): string;
}

export const jsonFormatter: ReportFormatter = {
  name: 'json',
  format: report => JSON.stringify(report, null, 2),
};

export const compactJsonFormatter: ReportFormatter = {
  name: 'compact',
  format: report => JSON.stringify(report),
};

export const FORMATTERS: readonly ReportFormatter[] = [jsonFormatter, compactJsonFormatter];

export function formatterFor(name: string): ReportFormatter | undefined {
  return FORMATTERS.find(f => f.name === name);
}
