import type { UserRecord } from '../accounts/user-store';

const DAY_MS = 24 * 60 * 60 * 1000;

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;', '<': '&lt;', '>': '&gt;', '"': '&quot;', "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, ch => HTML_ESCAPES[ch]);
}

export interface DashboardRow {
  email: string;
  plan: string;
  status: string;
  /** Negative once the trial has ended */
  trialDaysLeft: number;
  credits: number;
  payments: number;
  created: string;
}

export function summarizeUsers(users: UserRecord[], now: Date = new Date()): DashboardRow[] {
  return users.map(user => ({
    email: user.email,
    plan: user.plan,
    status: user.subscriptionStatus,
    trialDaysLeft: Math.floor((new Date(user.trialEnd).getTime() - now.getTime()) / DAY_MS),
    credits: user.credits,
    payments: user.payments.length,
    created: user.createdAt.slice(0, 10),
  }));
}

function trialCell(daysLeft: number): string {
  return daysLeft > 0 ? `${daysLeft} days left` : `Expired ${Math.abs(daysLeft)} days ago`;
}

/** Admin overview page listing every user */
export function renderDashboard(users: UserRecord[], now: Date = new Date()): string {
  const rows = summarizeUsers(users, now);

  const body = rows.length === 0
    ? '<p>No users yet.</p>'
    : `<p><strong>Total users:</strong> ${rows.length}</p>
<table>
<thead><tr><th>Email</th><th>Plan</th><th>Status</th><th>Trial</th><th>Credits</th><th>Payments</th><th>Created</th></tr></thead>
<tbody>
${rows.map(r => `<tr><td>${escapeHtml(r.email)}</td><td>${escapeHtml(r.plan)}</td><td>${escapeHtml(r.status)}</td><td>${trialCell(r.trialDaysLeft)}</td><td>${r.credits}</td><td>${r.payments}</td><td>${escapeHtml(r.created)}</td></tr>`).join('\n')}
</tbody>
</table>`;

  return `<!DOCTYPE html>
<html>
<head>
<meta charset="utf-8">
<title>Admin Dashboard</title>
<style>
body { font-family: system-ui, sans-serif; margin: 2rem; }
table { border-collapse: collapse; width: 100%; }
th, td { border-bottom: 1px solid #ddd; padding: 0.4rem 0.6rem; text-align: left; }
</style>
</head>
<body>
<h1>User Overview</h1>
${body}
</body>
</html>
`;
}
