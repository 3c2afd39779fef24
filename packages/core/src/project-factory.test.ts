import { describe, it, expect } from 'vitest';
import { ts } from 'ts-morph';
import { createScannerProject } from './project-factory.js';

describe('createScannerProject', () => {
  it('enables jsx and allowJs', () => {
    const options = createScannerProject().getCompilerOptions();
    expect(options.allowJs).toBe(true);
    expect(options.jsx).toBe(ts.JsxEmit.Preserve);
  });

  it('merges compiler option overrides shallowly', () => {
    const project = createScannerProject({
      compilerOptions: {
        jsx: ts.JsxEmit.React,
        allowJs: false,
      },
    });
    const options = project.getCompilerOptions();
    expect(options.allowJs).toBe(false);
    expect(options.jsx).toBe(ts.JsxEmit.React);
  });

  it('starts without source files', () => {
    expect(createScannerProject().getSourceFiles()).toHaveLength(0);
  });
});
