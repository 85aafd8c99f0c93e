/**
 * Injection tokens for the SSLCommerz module
 */

export const SSLCOMMERZ_CONFIG = Symbol('SSLCOMMERZ_CONFIG');
export const DATA_SOURCE = Symbol('DATA_SOURCE');
export const ORDER_STORE = Symbol('ORDER_STORE');
export const SETTINGS_SOURCE = Symbol('SETTINGS_SOURCE');
export const VALIDATION_CLIENT = Symbol('VALIDATION_CLIENT');
export const SESSION_CLIENT = Symbol('SESSION_CLIENT');
export const CALLBACK_PROCESSOR = Symbol('CALLBACK_PROCESSOR');
