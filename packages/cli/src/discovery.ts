import { readdirSync, existsSync, statSync } from 'node:fs';
import { basename, extname, join, resolve } from 'node:path';
import { createJiti } from 'jiti';
import { validateConfig, type CvsqlConfig } from '@cvsql/compiler';

// jiti compiles the TypeScript config file on the fly
const jiti = createJiti(import.meta.url);

export const CONFIG_FILE = 'cvsql.config.ts';
export const VIEWS_DIR = 'views';

// ── Types ───────────────────────────────────────────────────────────

export interface DiscoveredView {
  /** File name without the .xml extension; names the output files. */
  readonly name: string;
  readonly path: string;
}

export interface ProjectContext {
  readonly projectDir: string;
  readonly config: CvsqlConfig | null;
  readonly views: readonly DiscoveredView[];
}

export function viewFromPath(path: string): DiscoveredView {
  return { name: basename(path, extname(path)), path };
}

// ── View discovery ──────────────────────────────────────────────────

/**
 * Discover calculation views in the views/ directory: every *.xml
 * file, sorted by name.
 */
export function discoverViews(projectDir: string, targetView?: string): DiscoveredView[] {
  const viewsDir = join(projectDir, VIEWS_DIR);

  if (!existsSync(viewsDir)) {
    return [];
  }

  const views: DiscoveredView[] = [];

  for (const entry of readdirSync(viewsDir)) {
    const entryPath = join(viewsDir, entry);
    if (extname(entry).toLowerCase() !== '.xml') continue;
    if (!statSync(entryPath).isFile()) continue;

    const view = viewFromPath(entryPath);
    if (targetView && view.name !== targetView) continue;

    views.push(view);
  }

  return views.sort((a, b) => a.name.localeCompare(b.name));
}

// ── Config loading ──────────────────────────────────────────────────

/**
 * Load the project config from cvsql.config.ts.
 * Returns null if no config file exists.
 */
export async function loadConfig(projectDir: string): Promise<CvsqlConfig | null> {
  const configPath = join(projectDir, CONFIG_FILE);

  if (!existsSync(configPath)) {
    return null;
  }

  const mod = await jiti.import(resolve(configPath), { default: true });
  try {
    return validateConfig(mod);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid ${CONFIG_FILE}: ${message}`);
  }
}

// ── Full project context ────────────────────────────────────────────

export async function resolveProjectContext(
  projectDir: string,
  options?: { readonly view?: string },
): Promise<ProjectContext> {
  const config = await loadConfig(projectDir);
  const views = discoverViews(projectDir, options?.view);

  return {
    projectDir,
    config,
    views,
  };
}
