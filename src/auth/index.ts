/**
 * @fileoverview Auth Barrel Export
 */

export * from './auth.module';
export * from './auth.service';
export * from './jwt.strategy';
export * from './member-authenticator';
export * from './dto';
export * from './interfaces';
