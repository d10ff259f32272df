/**
 * Test utilities for running the transformer over in-memory sources
 */

import * as ts from "typescript";
import * as vm from "node:vm";
import macroTransformerFactory, {
  type MacroTransformerConfig,
} from "../transforms/macro-transformer.js";

/** Declarations the test program sees for `import ... from "truthish"` */
const RUNTIME_DECLARATIONS = `
export declare function truthy(expr: unknown): boolean;
export interface Truthy<A> { truthy(a: A): boolean }
`;

export const TEST_FILE = "/test.ts";

export const compilerOptions: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2020,
  module: ts.ModuleKind.ESNext,
  moduleResolution: ts.ModuleResolutionKind.Node10,
  strict: true,
  noEmit: true,
};

export interface TransformOutput {
  /** Printed source after expansion */
  code: string;

  /** Macro diagnostics, in report order */
  diagnostics: ts.Diagnostic[];

  /** Diagnostic messages without the `[truthish] ` prefix */
  messages: string[];

  /** Source text each diagnostic points at */
  spans: string[];
}

/**
 * Create a program holding `source` as /test.ts, a "truthish" module
 * declaration and any extra files given. Lib files come from the installed
 * TypeScript.
 */
export function createTestProgram(
  source: string,
  extraFiles: Record<string, string> = {},
): ts.Program {
  const files = new Map<string, string>([
    [TEST_FILE, source],
    ["/node_modules/truthish/index.d.ts", RUNTIME_DECLARATIONS],
    ...Object.entries(extraFiles),
  ]);

  const base = ts.createCompilerHost(compilerOptions);
  const host: ts.CompilerHost = {
    ...base,
    getSourceFile: (fileName, languageVersion, onError, shouldCreateNewSourceFile) => {
      const text = files.get(fileName);
      if (text !== undefined) {
        return ts.createSourceFile(fileName, text, languageVersion, true);
      }
      return base.getSourceFile(fileName, languageVersion, onError, shouldCreateNewSourceFile);
    },
    fileExists: (fileName) => files.has(fileName) || base.fileExists(fileName),
    readFile: (fileName) => files.get(fileName) ?? base.readFile(fileName),
    directoryExists: (dir) =>
      [...files.keys()].some((file) => file.startsWith(`${dir}/`)) ||
      (base.directoryExists?.(dir) ?? false),
    writeFile: () => {},
  };

  return ts.createProgram([TEST_FILE], compilerOptions, host);
}

/**
 * Run the transformer over `source` and print the result.
 */
export function transformSource(
  source: string,
  transformerConfig: MacroTransformerConfig = {},
  extraFiles: Record<string, string> = {},
): TransformOutput {
  const program = createTestProgram(source, extraFiles);
  const sourceFile = program.getSourceFile(TEST_FILE);
  if (!sourceFile) {
    throw new Error(`${TEST_FILE} is missing from the test program`);
  }

  const diagnostics: ts.Diagnostic[] = [];
  const result = ts.transform(sourceFile, [
    macroTransformerFactory(program, {
      ...transformerConfig,
      onDiagnostic: (diagnostic) => {
        diagnostics.push(diagnostic);
        transformerConfig.onDiagnostic?.(diagnostic);
      },
    }),
  ]);

  const printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed });
  const code = printer.printFile(result.transformed[0]);
  result.dispose();

  return {
    code,
    diagnostics,
    messages: diagnostics.map((d) =>
      ts.flattenDiagnosticMessageText(d.messageText, "\n").replace(/^\[truthish\] /, ""),
    ),
    spans: diagnostics.map((d) =>
      d.start === undefined || d.length === undefined
        ? ""
        : source.slice(d.start, d.start + d.length),
    ),
  };
}

/**
 * Compile transformed code to CommonJS and run it, resolving imports through
 * `modules`. Returns the module's exports.
 */
export function evaluate(code: string, modules: Record<string, unknown>): Record<string, unknown> {
  const js = ts.transpileModule(code, {
    compilerOptions: { module: ts.ModuleKind.CommonJS, target: ts.ScriptTarget.ES2020 },
  }).outputText;

  const moduleExports: Record<string, unknown> = {};
  const requireModule = (specifier: string): unknown => {
    if (!(specifier in modules)) {
      throw new Error(`Cannot find module '${specifier}'`);
    }
    return modules[specifier];
  };

  vm.runInNewContext(js, {
    exports: moduleExports,
    module: { exports: moduleExports },
    require: requireModule,
  });
  return moduleExports;
}

/** Look up an exported function of an evaluated module */
export function exportedFunction(
  exports: Record<string, unknown>,
  name: string,
): (...args: unknown[]) => unknown {
  const value = exports[name];
  if (typeof value !== "function") {
    throw new Error(`export '${name}' is not a function`);
  }
  return (...args) => Reflect.apply(value, undefined, args);
}
