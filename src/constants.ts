/**
 * 注入令牌与常量
 */

// 分支引用前缀
export const GIT_REFERENCE_NAME_PREFIX_BRANCH = 'refs/heads/';

export const EVENT_BUS = Symbol('EVENT_BUS');
export const PRINCIPAL_STORE = Symbol('PRINCIPAL_STORE');
export const REPOSITORY_STORE = Symbol('REPOSITORY_STORE');
export const PULLREQ_STORE = Symbol('PULLREQ_STORE');
export const GIT_DATA_ACCESSOR = Symbol('GIT_DATA_ACCESSOR');
export const URL_PROVIDER = Symbol('URL_PROVIDER');
export const WEBHOOK_DELIVERY = Symbol('WEBHOOK_DELIVERY');
export const PLATFORM_HTTP_CLIENT = Symbol('PLATFORM_HTTP_CLIENT');
export const DELIVERY_HTTP_CLIENT = Symbol('DELIVERY_HTTP_CLIENT');
