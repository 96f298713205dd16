/**
 * Finance Tracker page: entry form in the sidebar, range view in the main column
 */

import { html } from 'hono/html';
import { TRANSACTION_CATEGORIES } from '@tally/core';
import type { LedgerReport, Transaction } from '@tally/core';
import { renderLineChart, renderPieChart } from './charts.js';
import { formatCurrency, formatDisplayDate } from './format.js';
import { renderLayout } from './layout.js';

type Markup = ReturnType<typeof html>;

export type DashboardResult =
  | { kind: 'error'; message: string }
  | { kind: 'empty' }
  | {
      kind: 'report';
      startDate: Date;
      endDate: Date;
      transactions: Transaction[];
      report: LedgerReport;
    };

export interface DashboardView {
  /** YYYY-MM-DD default for the entry date picker */
  today: string;
  added: boolean;
  formErrors: string[];
  /** YYYY-MM-DD values for the range pickers */
  range: { start: string; end: string };
  result: DashboardResult;
}

function renderEntryForm(view: DashboardView): Markup {
  return html`<aside class="sidebar">
  <h2>Add a New Transaction</h2>
  ${view.added ? html`<p class="notice success">Transaction added successfully!</p>` : ''}
  ${view.formErrors.length > 0
    ? html`<ul class="notice error">${view.formErrors.map((message) => html`<li>${message}</li>`)}</ul>`
    : ''}
  <form method="post" action="/transactions">
    <label>Date <input type="date" name="date" value="${view.today}" required /></label>
    <label>Amount <input type="number" name="amount" min="0.01" step="0.01" value="0.01" required /></label>
    <label>Category
      <select name="category">
        ${TRANSACTION_CATEGORIES.map((category) => html`<option value="${category}">${category}</option>`)}
      </select>
    </label>
    <label>Description <input type="text" name="description" maxlength="200" /></label>
    <button type="submit">Add Transaction</button>
  </form>
</aside>`;
}

function renderTransactionTable(transactions: Transaction[]): Markup {
  return html`<table class="transactions">
  <thead><tr><th>date</th><th>amount</th><th>category</th><th>description</th></tr></thead>
  <tbody>
    ${transactions.map(
      (tx) =>
        html`<tr><td>${formatDisplayDate(tx.date)}</td><td class="amount">${tx.amount.toFixed(2)}</td><td>${tx.category}</td><td>${tx.description}</td></tr>
    `
    )}
  </tbody>
</table>`;
}

function renderSummary(report: LedgerReport): Markup {
  const metrics = [
    { label: 'Total Income', value: report.summary.totalIncome },
    { label: 'Total Expense', value: report.summary.totalExpense },
    { label: 'Net Savings', value: report.summary.netSavings },
  ];

  return html`<h3>Summary</h3>
<div class="metrics">
  ${metrics.map(
    (metric) => html`<div class="metric"><span class="metric-label">${metric.label}</span><span class="metric-value">${formatCurrency(metric.value)}</span></div>
  `
  )}
</div>`;
}

function renderResult(result: DashboardResult): Markup {
  switch (result.kind) {
    case 'error':
      return html`<p class="notice error">${result.message}</p>`;
    case 'empty':
      return html`<p>No transactions found in the selected date range.</p>`;
    case 'report': {
      const { report } = result;
      return html`<p>Transactions from ${formatDisplayDate(result.startDate)} to ${formatDisplayDate(result.endDate)}</p>
${renderTransactionTable(result.transactions)}
${renderSummary(report)}
<h3>Transaction Plot</h3>
${renderLineChart(report.timeSeries)}
<h3>Expense Analysis</h3>
${report.categoryBreakdown.size === 0
  ? html`<p>No expenses to analyze.</p>`
  : renderPieChart(report.categoryBreakdown)}`;
    }
  }
}

export function renderDashboardPage(view: DashboardView): Markup {
  return renderLayout(
    'Finance Tracker',
    html`${renderEntryForm(view)}
<main>
  <h1>Finance Tracker</h1>
  <h2>View Transactions</h2>
  <form method="get" action="/" class="range">
    <label>Start Date <input type="date" name="start" value="${view.range.start}" /></label>
    <label>End Date <input type="date" name="end" value="${view.range.end}" /></label>
    <button type="submit">Show</button>
  </form>
  ${renderResult(view.result)}
</main>`
  );
}
