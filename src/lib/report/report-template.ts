/**
 * HTML template for the timesheet report.
 *
 * One self-contained document: executive summary, data overview, then a
 * chart + table section for the daily trend, users, projects and activity
 * types, and a table of the most recent entries. Inline CSS only, so the
 * file renders the same in a browser, a PDF printer or an email client.
 */

import { format } from "date-fns";
import type {
  DailyTotal,
  DataOverview,
  ExecutiveSummary,
  ProjectSummaryRow,
  RecentEntry,
  SummaryRow,
  TimesheetReport,
  UserSummaryRow,
} from "../analytics/timesheet-summary";

export const NO_DATA_MESSAGE = "No data available for this section.";

export interface ReportRenderOptions {
  title: string;
  generatedAt: Date;
}

// ── Helpers ────────────────────────────────────────────────

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function formatHours(hours: number): string {
  return hours.toFixed(2);
}

function formatComma(n: number): string {
  return n.toLocaleString("en-US");
}

const TH = "padding:8px 12px;text-align:left;font-size:11px;font-weight:600;color:#6b7280;text-transform:uppercase;letter-spacing:0.05em;border-bottom:2px solid #e5e7eb;";
const TD = "padding:8px 12px;font-size:13px;color:#111827;border-bottom:1px solid #e5e7eb;";
const TD_NUM = `${TD}text-align:right;font-variant-numeric:tabular-nums;`;

// ── Building blocks ────────────────────────────────────────

function noData(): string {
  return `
      <div style="padding:16px;border:1px dashed #d1d5db;border-radius:8px;color:#6b7280;font-size:13px;text-align:center;">
        ${NO_DATA_MESSAGE}
      </div>`;
}

interface Column<T> {
  header: string;
  numeric?: boolean;
  cell: (row: T) => string;
}

function table<T>(columns: Column<T>[], rows: T[]): string {
  const head = columns
    .map((c) => `<th style="${TH}${c.numeric ? "text-align:right;" : ""}">${escapeHtml(c.header)}</th>`)
    .join("");
  const body = rows
    .map(
      (row) =>
        `<tr>${columns.map((c) => `<td style="${c.numeric ? TD_NUM : TD}">${escapeHtml(c.cell(row))}</td>`).join("")}</tr>`,
    )
    .join("\n");

  return `
      <table role="presentation" width="100%" cellpadding="0" cellspacing="0" style="border-collapse:collapse;margin-top:12px;">
        <tr style="background-color:#f9fafb;">${head}</tr>
        ${body}
      </table>`;
}

/** Horizontal bars scaled to the largest value. */
function barChart(items: { label: string; value: number }[], color: string): string {
  const max = Math.max(...items.map((i) => i.value), 0);
  const rows = items
    .map((item) => {
      const width = max > 0 ? Math.round((item.value / max) * 1000) / 10 : 0;
      return `
        <tr>
          <td style="padding:3px 8px 3px 0;font-size:12px;color:#374151;white-space:nowrap;width:30%;">${escapeHtml(item.label)}</td>
          <td style="padding:3px 0;">
            <div style="background-color:${color};height:14px;border-radius:3px;width:${width}%;"></div>
          </td>
          <td style="padding:3px 0 3px 8px;font-size:12px;color:#6b7280;text-align:right;width:70px;">${formatHours(item.value)} h</td>
        </tr>`;
    })
    .join("");

  return `
      <table role="presentation" width="100%" cellpadding="0" cellspacing="0" class="chart">${rows}
      </table>`;
}

function section(heading: string, body: string): string {
  return `
    <section style="margin-top:32px;">
      <h2 style="font-size:17px;font-weight:700;color:#111827;margin:0 0 8px;">${escapeHtml(heading)}</h2>
      ${body}
    </section>`;
}

// ── Sections ───────────────────────────────────────────────

export function executiveSummaryText(summary: ExecutiveSummary, overview: DataOverview): string {
  const span =
    overview.firstDate && overview.lastDate ? `Between ${overview.firstDate} and ${overview.lastDate}, ` : "";
  const lead =
    `${span}${formatComma(summary.activeUsers)} ${summary.activeUsers === 1 ? "person" : "people"} logged ` +
    `${formatHours(summary.totalHours)} hours across ${formatComma(summary.totalEntries)} entries on ` +
    `${formatComma(summary.activeProjects)} ${summary.activeProjects === 1 ? "project" : "projects"}, ` +
    `an average of ${formatHours(summary.averageHoursPerDay)} hours per active day.`;

  const leaders: string[] = [];
  if (summary.topUser) {
    leaders.push(`${summary.topUser.label} logged the most time (${formatHours(summary.topUser.totalHours)} h)`);
  }
  if (summary.topProject) {
    leaders.push(`${summary.topProject.label} received the most hours (${formatHours(summary.topProject.totalHours)} h)`);
  }
  return leaders.length > 0 ? `${lead} ${leaders.join(" and ")}.` : lead;
}

function executiveSection(report: TimesheetReport): string {
  if (!report.hasData || report.executive.totalEntries === 0) {
    const reason = report.hasData ? "No time entries passed the duration check." : report.reason;
    return section("Executive Summary", `${noData()}
      <p style="font-size:12px;color:#9ca3af;margin:8px 0 0;">${escapeHtml(reason)}</p>`);
  }
  return section(
    "Executive Summary",
    `<p style="font-size:14px;line-height:1.6;color:#374151;margin:0;">${escapeHtml(executiveSummaryText(report.executive, report.overview))}</p>`,
  );
}

function overviewSection(report: TimesheetReport): string {
  const o = report.overview;
  const rows: [string, string][] = [
    ["Companies fetched", formatComma(o.rawCounts.companies)],
    ["Projects fetched", formatComma(o.rawCounts.projects)],
    ["Users fetched", formatComma(o.rawCounts.users)],
    ["Activity types fetched", formatComma(o.rawCounts.activityTypes)],
    ["Time entries fetched", formatComma(o.rawCounts.timeEntries)],
    ["Entries included", formatComma(o.retainedEntries)],
    ["Entries excluded (duration)", formatComma(o.excludedEntries)],
    ["Date range", o.firstDate && o.lastDate ? `${o.firstDate} to ${o.lastDate}` : "—"],
    ["Total hours", formatHours(o.totalHours)],
  ];
  const body = table<[string, string]>(
    [
      { header: "Metric", cell: (r) => r[0] },
      { header: "Value", numeric: true, cell: (r) => r[1] },
    ],
    rows,
  );
  return section("Data Overview", report.hasData ? body : `${body}${noData()}`);
}

function trendSection(daily: DailyTotal[]): string {
  if (daily.length === 0) return section("Time Logging Trend", noData());
  const chart = barChart(daily.map((d) => ({ label: d.date, value: d.totalHours })), "#2563eb");
  const rows = table<DailyTotal>(
    [
      { header: "Date", cell: (d) => d.date },
      { header: "Hours", numeric: true, cell: (d) => formatHours(d.totalHours) },
      { header: "Entries", numeric: true, cell: (d) => formatComma(d.entryCount) },
      { header: "Users", numeric: true, cell: (d) => formatComma(d.userCount) },
    ],
    daily,
  );
  return section("Time Logging Trend", chart + rows);
}

function userSection(users: UserSummaryRow[]): string {
  if (users.length === 0) return section("User Performance", noData());
  const chart = barChart(users.map((u) => ({ label: u.label, value: u.totalHours })), "#16a34a");
  const rows = table<UserSummaryRow>(
    [
      { header: "User", cell: (u) => u.label },
      { header: "Hours", numeric: true, cell: (u) => formatHours(u.totalHours) },
      { header: "Entries", numeric: true, cell: (u) => formatComma(u.entryCount) },
      { header: "Projects", numeric: true, cell: (u) => formatComma(u.projectCount) },
      { header: "Share", numeric: true, cell: (u) => `${u.sharePercent.toFixed(1)}%` },
    ],
    users,
  );
  return section("User Performance", chart + rows);
}

function projectSection(projects: ProjectSummaryRow[]): string {
  if (projects.length === 0) return section("Project Breakdown", noData());
  const chart = barChart(projects.map((p) => ({ label: p.label, value: p.totalHours })), "#9333ea");
  const rows = table<ProjectSummaryRow>(
    [
      { header: "Project", cell: (p) => p.label },
      { header: "Company", cell: (p) => p.companyName },
      { header: "Hours", numeric: true, cell: (p) => formatHours(p.totalHours) },
      { header: "Entries", numeric: true, cell: (p) => formatComma(p.entryCount) },
      { header: "Users", numeric: true, cell: (p) => formatComma(p.userCount) },
      { header: "Share", numeric: true, cell: (p) => `${p.sharePercent.toFixed(1)}%` },
    ],
    projects,
  );
  return section("Project Breakdown", chart + rows);
}

function activitySection(activities: SummaryRow[]): string {
  if (activities.length === 0) return section("Activity Types", noData());
  const chart = barChart(activities.map((a) => ({ label: a.label, value: a.totalHours })), "#ea580c");
  const rows = table<SummaryRow>(
    [
      { header: "Activity", cell: (a) => a.label },
      { header: "Hours", numeric: true, cell: (a) => formatHours(a.totalHours) },
      { header: "Entries", numeric: true, cell: (a) => formatComma(a.entryCount) },
      { header: "Share", numeric: true, cell: (a) => `${a.sharePercent.toFixed(1)}%` },
    ],
    activities,
  );
  return section("Activity Types", chart + rows);
}

function recentSection(recent: RecentEntry[]): string {
  if (recent.length === 0) return section("Recent Entries", noData());
  return section(
    "Recent Entries",
    table<RecentEntry>(
      [
        { header: "Date", cell: (r) => r.date },
        { header: "User", cell: (r) => r.userName },
        { header: "Project", cell: (r) => r.projectTitle },
        { header: "Activity", cell: (r) => r.activityTitle },
        { header: "Hours", numeric: true, cell: (r) => formatHours(r.hours) },
        { header: "Description", cell: (r) => r.description },
      ],
      recent,
    ),
  );
}

// ── Public ─────────────────────────────────────────────────

export function buildReportHtml(report: TimesheetReport, options: ReportRenderOptions): string {
  const generated = format(options.generatedAt, "yyyy-MM-dd HH:mm");
  const sections = report.hasData
    ? [
        trendSection(report.daily),
        userSection(report.users),
        projectSection(report.projects),
        activitySection(report.activities),
        recentSection(report.recent),
      ]
    : [trendSection([]), userSection([]), projectSection([]), activitySection([]), recentSection([])];

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width,initial-scale=1">
  <title>${escapeHtml(options.title)}</title>
</head>
<body style="margin:0;padding:0;background-color:#ffffff;font-family:-apple-system,BlinkMacSystemFont,'Segoe UI',Roboto,'Helvetica Neue',Arial,sans-serif;">
  <main style="max-width:880px;margin:0 auto;padding:32px 16px;">
    <header style="border-bottom:1px solid #e5e7eb;padding-bottom:12px;">
      <h1 style="font-size:24px;font-weight:700;color:#111827;margin:0;">${escapeHtml(options.title)}</h1>
      <div style="font-size:13px;color:#6b7280;margin-top:4px;">Generated ${generated}</div>
    </header>
    ${executiveSection(report)}
    ${overviewSection(report)}
    ${sections.join("\n")}
    <footer style="margin-top:40px;font-size:11px;color:#9ca3af;text-align:center;">
      Generated automatically from timesheet data
    </footer>
  </main>
</body>
</html>
`;
}
