/**
 * Division Controller
 *
 * Handles search division operations exposed over HTTP.
 */

export { generateDivisionsPreview, toDivisionDto } from './divisionGenerate.js';
