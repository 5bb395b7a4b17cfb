export { SummaryStore } from './summary-store.js';
