export * from './gateway-settings.schema';
export * from './credentials-resolver';
