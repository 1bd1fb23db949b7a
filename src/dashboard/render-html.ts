/**
 * HTML Dashboard Renderer
 *
 * Pure function from the unified catalog to one self-contained page.
 * Screenshots arrive as data URIs and all data is embedded, so the file
 * works when opened straight from disk. Nothing time-dependent is rendered
 * server-side: relative times are computed in the browser.
 */

import type { MachineSummary, UnifiedEntry } from '../sync/aggregator.js';
import { compareRecentFirst } from '../sync/time.js';

export interface DashboardView {
  machine: { id: string; name: string };
  entries: readonly UnifiedEntry[];
  machines: readonly MachineSummary[];
  /** Pinned local paths in pin order */
  pinned: readonly string[];
  recentLimit: number;
  /** e.g. cursor://file{path} */
  editorUrlTemplate: string;
  /** localPath → data URI */
  screenshots: ReadonlyMap<string, string>;
}

interface Section {
  id: string;
  title: string;
  entries: UnifiedEntry[];
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * JSON that can sit inside a <script> element
 */
export function embedJson(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, '\\u003c')
    .replace(/>/g, '\\u003e')
    .replace(/&/g, '\\u0026')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');
}

// Opened projects first, then the rest by modification time
function byRecentUse(a: UnifiedEntry, b: UnifiedEntry): number {
  const opened = compareRecentFirst(a.mostRecentActivity, b.mostRecentActivity);
  if (opened !== 0) return opened;
  const aTime = a.record?.lastModified ?? '';
  const bTime = b.record?.lastModified ?? '';
  if (aTime !== bTime) return aTime < bTime ? 1 : -1;
  return a.title < b.title ? -1 : a.title > b.title ? 1 : 0;
}

/**
 * Split entries into the rows shown on the page
 */
export function buildSections(view: DashboardView): Section[] {
  const local = view.entries.filter(entry => entry.record !== null);
  const sections: Section[] = [];

  const pinned = view.pinned.flatMap(pinnedPath => local.filter(entry => entry.localPath === pinnedPath));
  if (pinned.length > 0) {
    sections.push({ id: 'pinned', title: 'Pinned', entries: pinned });
  }

  const recent = [...local].sort(byRecentUse).slice(0, view.recentLimit);
  if (recent.length > 0) {
    sections.push({ id: 'recent', title: 'Recent', entries: recent });
  }

  // Groups ordered by their most recently modified project
  const groups = new Map<string, UnifiedEntry[]>();
  for (const entry of local) {
    const group = entry.record?.group ?? '';
    groups.set(group, [...(groups.get(group) ?? []), entry]);
  }
  const groupNewest = (entries: UnifiedEntry[]): string =>
    entries.reduce((newest, entry) => {
      const modified = entry.record?.lastModified ?? '';
      return modified > newest ? modified : newest;
    }, '');
  const groupNames = [...groups.keys()].sort((a, b) => {
    const aNewest = groupNewest(groups.get(a) ?? []);
    const bNewest = groupNewest(groups.get(b) ?? []);
    if (aNewest !== bNewest) return aNewest < bNewest ? 1 : -1;
    return a < b ? -1 : a > b ? 1 : 0;
  });
  for (const name of groupNames) {
    sections.push({ id: `group-${name}`, title: name, entries: groups.get(name) ?? [] });
  }

  const elsewhere = view.entries.filter(entry => entry.record === null && entry.presence === 'cloned');
  if (elsewhere.length > 0) {
    sections.push({ id: 'elsewhere', title: 'On other machines', entries: elsewhere });
  }

  const available = view.entries.filter(entry => entry.presence === 'available');
  if (available.length > 0) {
    sections.push({ id: 'available', title: 'Available on remote', entries: available });
  }

  return sections;
}

function renderCard(entry: UnifiedEntry, view: DashboardView): string {
  const screenshot = entry.localPath ? view.screenshots.get(entry.localPath) : undefined;
  const image = screenshot
    ? `<img class="screenshot" src="${escapeHtml(screenshot)}" alt="${escapeHtml(entry.title)}">`
    : '<div class="no-screenshot">&#128193;</div>';

  const tags = entry.tags
    .slice(0, 3)
    .map(tag => `<span class="tag">${escapeHtml(tag)}</span>`)
    .join('');

  const badges = [
    entry.presence === 'available' ? '<span class="badge available">remote</span>' : '',
    entry.status === 'archived' ? '<span class="badge archived">archived</span>' : '',
    entry.stale ? '<span class="badge stale">stale</span>' : '',
  ].join('');

  const machines = entry.machines
    .filter(machine => machine.localPath !== null)
    .map(machine => escapeHtml(machine.machineName))
    .join(', ');

  const attributes = [
    `class="project-card ${entry.presence}"`,
    `data-key="${escapeHtml(entry.key)}"`,
    entry.localPath ? `data-path="${escapeHtml(entry.localPath)}"` : '',
    entry.remote ? `data-url="${escapeHtml(entry.remote.url)}"` : '',
    entry.mostRecentActivity ? `data-activity="${escapeHtml(entry.mostRecentActivity)}"` : '',
  ]
    .filter(Boolean)
    .join(' ');

  return [
    `<div ${attributes}>`,
    `<div class="screenshot-container">${image}<div class="badges">${badges}</div></div>`,
    '<div class="project-info">',
    `<h3>${escapeHtml(entry.title)}</h3>`,
    `<p class="one-liner">${escapeHtml(entry.oneLiner || 'No description')}</p>`,
    entry.record ? `<p class="project-path">${escapeHtml(entry.record.relativePath)}</p>` : '',
    machines ? `<p class="machines">${machines}</p>` : '',
    '<p class="activity"></p>',
    tags ? `<div class="tags">${tags}</div>` : '',
    '</div>',
    entry.localPath ? '<button class="pin-btn" title="Pin">&#128204;</button>' : '',
    '</div>',
  ].join('');
}

const STYLE = `
* { box-sizing: border-box; }
body { margin: 0; font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", sans-serif; background: #14161a; color: #e6e6e6; }
header { padding: 24px 32px; display: flex; justify-content: space-between; align-items: baseline; }
header h1 { margin: 0; font-size: 22px; }
#search { background: #22252b; border: 1px solid #333; color: inherit; padding: 8px 12px; border-radius: 6px; width: 280px; }
.machines-bar { padding: 0 32px; color: #888; font-size: 13px; }
.machines-bar .stale { color: #e0a000; }
section { padding: 12px 32px; }
section h2 { font-size: 16px; color: #9aa; margin: 12px 0; }
.row { display: flex; gap: 16px; overflow-x: auto; padding-bottom: 8px; }
.project-card { position: relative; flex: 0 0 240px; background: #1d2026; border-radius: 10px; overflow: hidden; cursor: pointer; }
.project-card.available { opacity: 0.7; }
.project-card:hover { outline: 2px solid #4a7dff; }
.screenshot-container { position: relative; height: 130px; background: #262a31; display: flex; align-items: center; justify-content: center; }
.screenshot { width: 100%; height: 100%; object-fit: cover; }
.no-screenshot { font-size: 40px; }
.badges { position: absolute; top: 6px; left: 6px; display: flex; gap: 4px; }
.badge { font-size: 11px; padding: 2px 6px; border-radius: 4px; background: #333; }
.badge.available { background: #2f5d9e; }
.badge.stale { background: #8a6400; }
.project-info { padding: 10px 12px; }
.project-info h3 { margin: 0 0 4px; font-size: 15px; }
.one-liner, .project-path, .machines, .activity { margin: 2px 0; font-size: 12px; color: #aaa; }
.tags { margin-top: 6px; display: flex; gap: 4px; flex-wrap: wrap; }
.tag { font-size: 11px; background: #2a2e36; padding: 2px 6px; border-radius: 4px; }
.pin-btn { position: absolute; top: 6px; right: 6px; background: rgba(0,0,0,0.4); border: 0; border-radius: 4px; cursor: pointer; }
.project-card.pinned .pin-btn { background: #4a7dff; }
`;

const SCRIPT = `
const data = JSON.parse(document.getElementById('devshelf-data').textContent);
const served = location.protocol === 'http:' || location.protocol === 'https:';
const pinned = new Set(data.pinned);

function relative(iso) {
  const minutes = Math.floor((Date.now() - Date.parse(iso)) / 60000);
  if (minutes < 1) return 'just now';
  if (minutes < 60) return minutes + 'm ago';
  if (minutes < 1440) return Math.floor(minutes / 60) + 'h ago';
  if (minutes < 10080) return Math.floor(minutes / 1440) + 'd ago';
  return new Date(iso).toLocaleDateString();
}

function openProject(card, event) {
  const path = card.dataset.path;
  if (!path) {
    if (card.dataset.url) window.open(card.dataset.url, '_blank');
    return;
  }
  if (served) {
    const newWindow = event.metaKey || event.ctrlKey;
    fetch('/open?path=' + encodeURIComponent(path) + '&new=' + newWindow);
  } else {
    window.location.href = data.editorUrlTemplate.replace('{path}', encodeURI(path));
  }
}

function togglePin(card) {
  if (!served) return;
  fetch('/toggle-pin?path=' + encodeURIComponent(card.dataset.path))
    .then(response => response.json())
    .then(result => card.classList.toggle('pinned', result.pinned));
}

document.querySelectorAll('.project-card').forEach(card => {
  if (card.dataset.activity) {
    card.querySelector('.activity').textContent = relative(card.dataset.activity);
  }
  if (pinned.has(card.dataset.path)) card.classList.add('pinned');
  const pin = card.querySelector('.pin-btn');
  if (pin) pin.addEventListener('click', event => { event.stopPropagation(); togglePin(card); });
  card.addEventListener('click', event => openProject(card, event));
});

document.getElementById('search').addEventListener('input', event => {
  const term = event.target.value.toLowerCase();
  document.querySelectorAll('.project-card').forEach(card => {
    card.style.display = card.textContent.toLowerCase().includes(term) ? '' : 'none';
  });
});
`;

export function renderDashboard(view: DashboardView): string {
  const sections = buildSections(view)
    .map(section =>
      [
        `<section id="${escapeHtml(section.id)}">`,
        `<h2>${escapeHtml(section.title)} <span class="count">${section.entries.length}</span></h2>`,
        `<div class="row">${section.entries.map(entry => renderCard(entry, view)).join('\n')}</div>`,
        '</section>',
      ].join('\n'),
    )
    .join('\n');

  const machineList = view.machines
    .map(machine => {
      const label = escapeHtml(machine.machineName) + (machine.isLocal ? ' (this machine)' : '');
      return machine.stale ? `<span class="stale">${label} &#9888;</span>` : `<span>${label}</span>`;
    })
    .join(' &middot; ');

  const data = {
    machine: view.machine,
    pinned: view.pinned,
    editorUrlTemplate: view.editorUrlTemplate,
    entries: view.entries.map(entry => ({
      key: entry.key,
      title: entry.title,
      presence: entry.presence,
      localPath: entry.localPath,
      mostRecentActivity: entry.mostRecentActivity,
    })),
  };

  const emptyState =
    view.entries.length === 0 ? '<section><p>No projects found. Add a declaration file to a project folder.</p></section>' : '';

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>devshelf</title>
<style>${STYLE}</style>
</head>
<body>
<header>
<h1>devshelf <span class="count">${view.entries.length}</span></h1>
<input id="search" type="search" placeholder="Filter projects">
</header>
<div class="machines-bar">${machineList}</div>
${emptyState}${sections}
<script id="devshelf-data" type="application/json">${embedJson(data)}</script>
<script>${SCRIPT}</script>
</body>
</html>
`;
}
