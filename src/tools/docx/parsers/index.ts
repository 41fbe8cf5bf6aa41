/**
 * DOCX Parsers
 * Centralized exports for all parsing utilities
 */

export * from './slide-parser.js';
