/**
 * Utility functions for Tidelock
 */

// Fixed-point arithmetic
export * from './fixed-point.js';

// Asset profiles and decimals
export * from './decimals.js';
