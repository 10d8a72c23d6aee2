/**
 * Domain Layer - Pure sync logic with no git or shell access of its own.
 *
 * TreeBuilder writes trees only through the writer it is handed. For work
 * that needs git or a shell, use the operations layer.
 */

export { ApplyScriptBuilder, shellQuote } from './ApplyScriptBuilder'
export type { ApplyScriptParams } from './ApplyScriptBuilder'
export { DestinationResolver } from './DestinationResolver'
export { ModuleGraphBuilder } from './ModuleGraphBuilder'
export type { DiscoveredModule } from './ModuleGraphBuilder'
export { TreeBuilder } from './TreeBuilder'
export type { TreeWriter } from './TreeBuilder'
