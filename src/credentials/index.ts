/**
 * @fileoverview Credentials Barrel Export
 */

export * from './pin-hash';
export * from './pin-table';
export * from './csv';
