/**
 * Pipeline Module
 * Exports all pipeline components
 */

export * from './classifier.js';
export * from './detector.js';
