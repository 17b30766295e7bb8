/**
 * Automation Layer
 *
 * Timeout management for the metadata lookups of dispatch auto-detection.
 *
 * @module automation
 */

export * from './TimeoutManager.js';
