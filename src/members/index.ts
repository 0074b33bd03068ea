/**
 * @fileoverview Members Barrel Export
 */

export * from './members.module';
export * from './members.repository';
export * from './members.service';
export * from './member-table';
export * from './dto';
export * from './interfaces';
