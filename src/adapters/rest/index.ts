export * from './rest.module';
export * from './guards/signed-request.guard';
export * from './filters/registry-exception.filter';
