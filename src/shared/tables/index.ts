/**
 * @fileoverview Shared Tables Barrel Export
 */

export * from './table';
export * from './table-errors';
