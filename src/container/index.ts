/**
 * Container module
 * Dependency injection container and tokens
 */

export { ServiceContainer, createServiceContainer } from "./ServiceContainer";
export type { ServiceFactory, Token } from "./ServiceContainer";
export { TOKENS } from "./tokens";
export { registerServices } from "./registration";
