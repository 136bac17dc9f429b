/**
 * @fileoverview Plugin loader barrel exports
 *
 * @module @daybreak/engine/plugins
 */

export {
    PluginLoader,
    createComposerFromYaml,
    isYamlComposerDefinition,
    type YamlComposerDefinition,
    type LoadedPlugins,
    type PluginLoaderConfig,
} from "./PluginLoader.js";
