/**
 * Handler exports for the API layer.
 */

export * from './ScanHandlers.js';
