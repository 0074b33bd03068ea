export * from './session-payload.interface';
