/**
 * Package loader
 * Resolves imported package names to `<name>.yaml` files on a search path.
 */
import * as fs from 'fs';
import * as path from 'path';
import { DataScript, PackageData, PackageScript } from '../spec/types';
import { ScriptCompiler } from '../compiler/compile';
import { loadEngineConfig } from '../config';
import { BuiltinRegistry } from '../features/registry';
import { LoggerFactory } from '../logging/logger';
import { RuntimeError } from './errors';
import { loadPackageData } from './packages';

const logger = LoggerFactory.getLogger('PackageLoader');

const EXTENSIONS = ['.yaml', '.yml'];

export interface PackageLoaderOptions {
  /** Replaces the default search paths when given */
  searchPaths?: string[];
  compiler?: ScriptCompiler;
  registry?: BuiltinRegistry;
}

export class PackageLoader {
  private readonly paths: string[];
  private readonly cache = new Map<string, PackageScript>();
  private readonly compiler: ScriptCompiler;
  private readonly registry?: BuiltinRegistry;

  constructor(options: PackageLoaderOptions = {}) {
    this.registry = options.registry;
    this.compiler = options.compiler ?? new ScriptCompiler(options.registry);
    this.paths = options.searchPaths
      ? [...options.searchPaths]
      : [
          path.join(process.cwd(), 'packages'),
          process.cwd(),
          path.join(process.cwd(), 'stdlib'),
          ...loadEngineConfig().packagePaths,
        ];
  }

  addSearchPath(dir: string): void {
    this.paths.push(dir);
  }

  searchPaths(): readonly string[] {
    return this.paths;
  }

  /**
   * Load and compile one package, cached by name.
   */
  loadPackage(name: string): PackageScript {
    const cached = this.cache.get(name);
    if (cached) {
      return cached;
    }

    const file = this.findPackageFile(name);
    let source: string;
    try {
      source = fs.readFileSync(file, 'utf-8');
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      throw RuntimeError.typeError(`Cannot read package file ${file}: ${message}`);
    }

    const script = this.compiler.compileFromYAML(source);
    if (script.kind !== 'package') {
      throw RuntimeError.typeError(`File ${file} is not a package script`);
    }

    logger.info('Package loaded', { package: name, file });
    this.cache.set(name, script);
    return script;
  }

  loadPackages(names: readonly string[]): Map<string, PackageScript> {
    const packages = new Map<string, PackageScript>();
    for (const name of names) {
      packages.set(name, this.loadPackage(name));
    }
    return packages;
  }

  /**
   * Load a data script's imports and evaluate them into package data.
   */
  resolveImports(script: DataScript): PackageData {
    return loadPackageData(script.imports, this.loadPackages(script.imports), this.registry);
  }

  clearCache(): void {
    this.cache.clear();
  }

  private findPackageFile(name: string): string {
    for (const dir of this.paths) {
      for (const ext of EXTENSIONS) {
        const candidate = path.join(dir, `${name}${ext}`);
        if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
          return candidate;
        }
      }
    }
    throw RuntimeError.typeError(
      `Package not found: ${name} (searched ${this.paths.join(', ')})`
    );
  }
}
