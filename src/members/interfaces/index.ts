export * from './member.interface';
