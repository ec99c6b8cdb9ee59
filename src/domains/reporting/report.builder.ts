// ──────────────────────────────────────────
// Reporting: Campaign report and proposal/invoice builders
// ──────────────────────────────────────────

import type { CampaignQuote, Channel, InvoiceLine, ReportRow } from '../../shared/types';
import {
  formatCompactDate,
  formatCount,
  formatIsoDate,
  formatNumber,
  formatPercent,
  formatRm,
} from '../../shared/format';
import { toCsv } from './csv';

export const REPORT_COLUMNS = ['Category', 'Item', 'Value'] as const;

export const INVOICE_COLUMNS = [
  'Item Reference',
  'Date',
  'Description',
  'Quantity',
  'Unit Cost (RM)',
  'Total Cost (RM)',
] as const;

const INVOICE_DESCRIPTIONS: Record<Channel, string> = {
  sms: 'SMS Marketing',
  app: 'App Notifications',
  edm: 'eDM Campaign',
  statement: 'Statement Messages',
  banner: 'Website Banner',
};

export interface DocumentContext {
  reference: string;
  issuedAt: Date;
}

/** Four groups; only the first row of each group carries the category name. */
export function buildReportRows(quote: CampaignQuote, ctx: DocumentContext): ReportRow[] {
  const { input, costs } = quote;

  const groups: [string, [string, string][]][] = [
    ['Campaign Information', [
      ['Target Users', formatCount(input.targetUsers)],
      ['Campaign Date', formatIsoDate(ctx.issuedAt)],
      ['Setup Cost', formatRm(quote.setupFee)],
      ['Partner Reference', ctx.reference],
    ]],
    ['Channel Allocation', [
      ['SMS Reach', `${input.sms}%`],
      ['eDM Reach', `${input.edm}%`],
      ['App Notification', `${input.app}%`],
      ['Statement Message Duration', `${input.statementWeeks} weeks`],
      ['Website Banner Duration', `${input.bannerWeeks} weeks`],
    ]],
    ['Costs', [
      ['SMS Cost (per user)', formatRm(costs.sms, 4, false)],
      ['App Notification Cost (per user)', formatRm(costs.app, 4, false)],
      ['eDM Cost (per user)', formatRm(costs.edm, 4, false)],
      ['Statement Message Cost (per week)', formatRm(costs.statement)],
      ['Website Banner Cost (per week)', formatRm(costs.banner)],
    ]],
    ['Campaign Metrics', [
      ['Total Marketing Cost', formatRm(quote.marketingCost)],
      ['Cost Per User', formatRm(quote.costPerUser, 4, false)],
      ['Estimated Approvals', formatCount(quote.approvals)],
      ['Base Conversion Rate', formatPercent(quote.baseConversionRate, 2)],
      ['Adjusted Conversion Rate', formatPercent(quote.adjustedConversionRate, 4)],
      ['Cost Per Acquisition', formatRm(quote.cpa)],
    ]],
  ];

  return groups.flatMap(([category, items]) =>
    items.map(([item, value], i) => ({ Category: i === 0 ? category : '', Item: item, Value: value }))
  );
}

/** Amounts are summed in whole cents so the TOTAL row always equals its lines. */
export function buildInvoiceLines(quote: CampaignQuote, ctx: DocumentContext): InvoiceLine[] {
  const cents = (n: number) => Math.round(n * 100);
  const money = (amountCents: number) => formatNumber(amountCents / 100, 2, false);

  const line = (description: string, quantity: string, unit: string, totalCents: number): InvoiceLine => ({
    'Item Reference': '',
    Date: '',
    Description: description,
    Quantity: quantity,
    'Unit Cost (RM)': unit,
    'Total Cost (RM)': money(totalCents),
  });

  const setupCents = cents(quote.setupFee);
  let totalCents = setupCents;

  const channelLines = quote.breakdown.map((row) => {
    const rowCents = cents(row.totalCost);
    totalCents += rowCents;
    return row.unit === 'user'
      ? line(INVOICE_DESCRIPTIONS[row.channel], formatNumber(row.quantity, 0), formatNumber(row.unitCost, 4, false), rowCents)
      : line(INVOICE_DESCRIPTIONS[row.channel], String(row.quantity), money(cents(row.unitCost)), rowCents);
  });

  return [
    {
      ...line('Campaign Setup Fee', '1', money(setupCents), setupCents),
      'Item Reference': ctx.reference,
      Date: formatIsoDate(ctx.issuedAt),
    },
    ...channelLines,
    line('TOTAL', '', '', totalCents),
  ];
}

export function renderReportCsv(quote: CampaignQuote, ctx: DocumentContext): string {
  return toCsv(REPORT_COLUMNS, buildReportRows(quote, ctx));
}

export function renderInvoiceCsv(quote: CampaignQuote, ctx: DocumentContext): string {
  return toCsv(INVOICE_COLUMNS, buildInvoiceLines(quote, ctx));
}

export function reportFileName(issuedAt: Date): string {
  return `campaign_proposal_${formatCompactDate(issuedAt)}.csv`;
}

export function invoiceFileName(issuedAt: Date): string {
  return `invoice_${formatCompactDate(issuedAt)}.csv`;
}
