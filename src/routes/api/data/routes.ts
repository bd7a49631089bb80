/**
 * Data API Route Barrel Export
 */

export { default as DataGet } from '@src/routes/api/data/GET.js';
