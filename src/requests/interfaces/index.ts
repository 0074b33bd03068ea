export * from './leave-request.interface';
