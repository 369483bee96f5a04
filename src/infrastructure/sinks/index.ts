export type { SinkMode } from './http.js';
export { createTicketSink, createMockTicketSink, createHttpTicketSink } from './ticket-sink.js';
export { createReportSink, createMockReportSink, createHttpReportSink, escapeHtml } from './report-sink.js';
