declare module '@babel/plugin-transform-typescript' {
  import type { PluginObj } from '@babel/core';

  const plugin: (api: object, options?: object) => PluginObj;
  export default plugin;
}
