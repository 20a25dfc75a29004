/**
 * Plugins Module
 * @module plugins
 */

export { default as swaggerPlugin } from './swagger';
export type { SwaggerPluginOptions } from './swagger';
