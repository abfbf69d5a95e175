export * as XS from './xs';
