export * from './leave-summary.dto';
