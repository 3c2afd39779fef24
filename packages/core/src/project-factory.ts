import { Project, ts, type ProjectOptions } from 'ts-morph';

const SCANNER_OPTIONS: ProjectOptions = {
  skipAddingFilesFromTsConfig: true,
  skipFileDependencyResolution: true,
  useInMemoryFileSystem: true,
  compilerOptions: {
    allowJs: true,
    jsx: ts.JsxEmit.Preserve,
  },
};

function buildOptions(base: ProjectOptions, overrides?: ProjectOptions): ProjectOptions {
  if (!overrides) {
    return {
      ...base,
      compilerOptions: base.compilerOptions ? { ...base.compilerOptions } : undefined,
    };
  }

  const { compilerOptions: baseCompiler } = base;
  const { compilerOptions: overrideCompiler, ...restOverrides } = overrides;

  return {
    ...base,
    ...restOverrides,
    compilerOptions: {
      ...(baseCompiler ?? {}),
      ...(overrideCompiler ?? {}),
    },
  };
}

/** Project used to parse source text; files are added from memory, never from disk. */
export function createScannerProject(overrides?: ProjectOptions): Project {
  return new Project(buildOptions(SCANNER_OPTIONS, overrides));
}
