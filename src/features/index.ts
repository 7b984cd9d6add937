/**
 * Features Module Barrel Export
 */

export { FaqDirectory } from './FaqDirectory.js';
