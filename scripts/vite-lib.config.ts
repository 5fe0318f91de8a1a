import type { UserConfig } from 'vite';
import { resolve } from 'node:path';
import dts from 'vite-plugin-dts';

export interface LibConfigOptions {
  name: string;                          // 库名
  fileName: string;                      // 输出文件名前缀
  entry?: string;                        // 入口文件路径
  external?: (string | RegExp)[];        // 外部依赖，不打包
  rootDir: string;                       // 包的根目录
}

/**
 * 工作区各包共用的库构建配置：输出 ESM 与 CommonJS 两种格式，并生成类型声明
 */
export function createLibConfig(options: LibConfigOptions): UserConfig {
  const { name, fileName, entry = 'src/index.ts', external = [], rootDir } = options;

  return {
    root: rootDir,
    build: {
      lib: {
        entry: resolve(rootDir, entry),
        name,
        formats: ['es', 'cjs'],
        fileName: (format) => `${fileName}.${format === 'es' ? 'js' : 'cjs'}`
      },
      outDir: resolve(rootDir, 'dist'),
      rollupOptions: {
        external: [...external, /^node:/]
      },
      target: 'node20',
      sourcemap: true,
      emptyOutDir: true
    },
    plugins: [
      dts({
        entryRoot: resolve(rootDir, 'src'),
        outDir: resolve(rootDir, 'dist'),
        tsconfigPath: resolve(rootDir, '../../tsconfig.json'),
        include: [resolve(rootDir, 'src')],
        insertTypesEntry: true
      })
    ]
  };
}
