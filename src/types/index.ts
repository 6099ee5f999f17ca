/**
 * Type barrel for the fleet compliance scanner.
 */

export * from './core';
export * from './scan';
export * from './plan';
