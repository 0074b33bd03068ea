export * from './create-request.dto';
