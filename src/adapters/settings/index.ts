export * from './static-settings.source';
