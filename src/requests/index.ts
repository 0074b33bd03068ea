/**
 * @fileoverview Requests Barrel Export
 */

export * from './requests.module';
export * from './requests.repository';
export * from './requests.service';
export * from './dto';
export * from './interfaces';
