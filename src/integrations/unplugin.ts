/**
 * truthish unplugin integration
 *
 * Universal plugin that works with Vite, Rollup, Webpack, esbuild, and Rspack.
 * Uses the TypeScript compiler API to create a Program, then runs the macro
 * transformer on each .ts/.tsx file during the build.
 *
 * @example vite.config.ts
 * ```typescript
 * import { unplugin } from "truthish/unplugin";
 *
 * export default { plugins: [unplugin.vite({ verbose: true })] };
 * ```
 */

import * as ts from "typescript";
import * as path from "path";
import { createUnplugin, type UnpluginFactory } from "unplugin";
import macroTransformerFactory, {
  type MacroTransformerConfig,
} from "../transforms/macro-transformer.js";

export interface TruthishPluginOptions {
  /** Path to tsconfig.json (default: auto-detected) */
  tsconfig?: string;

  /** File patterns to include (default: /\.[jt]sx?$/) */
  include?: RegExp | string[];

  /** File patterns to exclude (default: /node_modules/) */
  exclude?: RegExp | string[];

  /** Enable verbose logging */
  verbose?: boolean;

  /** Passed through to the transformer */
  runtimeModule?: string;
}

export interface ProgramCache {
  program: ts.Program;
  config: ts.ParsedCommandLine;
}

export function findTsConfig(cwd: string, explicit?: string): string {
  if (explicit) {
    return path.resolve(cwd, explicit);
  }

  const found = ts.findConfigFile(cwd, ts.sys.fileExists, "tsconfig.json");
  if (!found) {
    throw new Error(
      `[truthish] Could not find tsconfig.json from ${cwd}. ` +
        `Pass the tsconfig option to specify the path explicitly.`,
    );
  }
  return found;
}

/** Build a program from the files and options of a tsconfig.json */
export function loadProgram(configPath: string): ProgramCache {
  const configFile = ts.readConfigFile(configPath, ts.sys.readFile);
  if (configFile.error) {
    throw new Error(
      `[truthish] Error reading ${configPath}: ${ts.flattenDiagnosticMessageText(configFile.error.messageText, "\n")}`,
    );
  }

  const config = ts.parseJsonConfigFileContent(configFile.config, ts.sys, path.dirname(configPath));
  const program = ts.createProgram(config.fileNames, config.options);

  return { program, config };
}

export function shouldTransform(
  id: string,
  include?: RegExp | string[],
  exclude?: RegExp | string[],
): boolean {
  const normalizedId = id.replace(/\\/g, "/");

  // Check exclude first
  if (exclude) {
    if (exclude instanceof RegExp) {
      if (exclude.test(normalizedId)) return false;
    } else if (exclude.some((pattern) => normalizedId.includes(pattern))) {
      return false;
    }
  } else if (/node_modules/.test(normalizedId)) {
    return false;
  }

  // Check include
  if (include) {
    if (include instanceof RegExp) {
      return include.test(normalizedId);
    }
    return include.some((pattern) => normalizedId.includes(pattern));
  }

  return /\.[jt]sx?$/.test(normalizedId);
}

function formatDiagnostic(diagnostic: ts.Diagnostic): string {
  const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, "\n");
  if (!diagnostic.file || diagnostic.start === undefined) return message;
  const { line, character } = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start);
  return `${diagnostic.file.fileName}:${line + 1}:${character + 1} ${message}`;
}

/** Where the plugin sends expansion errors; the bundler context in a build */
export interface TransformReporter {
  error(message: string): void;
}

/**
 * Expand the macro calls of one module of `program`. Returns null when the
 * module is not in the program, nothing was expanded, or an error was
 * reported.
 */
export function transformModule(
  program: ts.Program,
  id: string,
  options: TruthishPluginOptions,
  reporter: TransformReporter,
): { code: string; map: null } | null {
  const verbose = options.verbose ?? false;
  const sourceFile = program.getSourceFile(id);
  if (!sourceFile) {
    // File not in the TS program -- skip
    if (verbose) {
      console.log(`[truthish] Skipping ${id} (not in program)`);
    }
    return null;
  }

  const errors: ts.Diagnostic[] = [];
  const transformerConfig: MacroTransformerConfig = {
    verbose,
    runtimeModule: options.runtimeModule,
    onDiagnostic: (diagnostic) => {
      errors.push(diagnostic);
    },
  };

  const result = ts.transform(sourceFile, [macroTransformerFactory(program, transformerConfig)]);
  const [transformed] = result.transformed;

  if (errors.length > 0) {
    result.dispose();
    reporter.error(errors.map(formatDiagnostic).join("\n"));
    return null;
  }

  if (transformed === sourceFile) {
    result.dispose();
    return null;
  }

  const printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed });
  const code = printer.printFile(transformed);
  result.dispose();

  return { code, map: null };
}

export const unpluginFactory: UnpluginFactory<TruthishPluginOptions | undefined> = (
  options = {},
) => {
  let cache: ProgramCache | undefined;
  const verbose = options.verbose ?? false;

  return {
    name: "truthish",
    enforce: "pre",

    buildStart() {
      try {
        const configPath = findTsConfig(process.cwd(), options.tsconfig);
        cache = loadProgram(configPath);
        if (verbose) {
          console.log(`[truthish] Loaded config from ${configPath}`);
          console.log(`[truthish] Program has ${cache.config.fileNames.length} files`);
        }
      } catch (error) {
        console.error(String(error));
      }
    },

    transformInclude(id) {
      return shouldTransform(id, options.include, options.exclude);
    },

    transform(_code, id) {
      if (!cache) return null;
      return transformModule(cache.program, id, options, this);
    },
  };
};

export const unplugin = /*#__PURE__*/ createUnplugin(unpluginFactory);
