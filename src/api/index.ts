export { StatusServer, type StatusServerOptions } from './server.js';
export { escapeHtml, getDashboardHTML, type DashboardHost } from './templates.js';
