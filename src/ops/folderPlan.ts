import fs from 'node:fs';
import path from 'node:path';
import type { IgnoreRules } from '../types/config.js';
import { ValidationError } from './errors.js';
import { IgnoreMatcher } from './ignore/IgnoreMatcher.js';

export const TOP_FOLDER = '.';

export enum FolderStepKind {
  CREATE_FOLDER = 'CREATE_FOLDER',
  UPLOAD_FILE = 'UPLOAD_FILE'
}

export interface FolderStep {
  kind: FolderStepKind;
  name: string;
  /** `/`-separated path relative to the uploaded folder; `.` for the folder itself. */
  relPath: string;
  /** Relative path of the folder this step lands in; null for the top folder. */
  parentRelPath: string | null;
  localPath: string;
}

export interface FolderPlan {
  localFolder: string;
  rootName: string;
  steps: FolderStep[];
  folderCount: number;
  fileCount: number;
  ignoredCount: number;
}

export interface FolderPlanOptions {
  skipHidden?: boolean;
  ignore?: IgnoreRules;
}

export function isHiddenName(name: string): boolean {
  return name.startsWith('.');
}

/**
 * Walks a local folder top-down and lists the remote steps in the order they
 * must run: each folder is created before anything inside it. At every level
 * the subfolders are created, then the files are uploaded, then the walk
 * descends. Symbolic links count as what they point to; a linked folder is
 * created but not descended into, and a dangling link is ignored.
 */
export function planFolderUpload(localFolder: string, options: FolderPlanOptions = {}): FolderPlan {
  const absolute = path.resolve(localFolder);
  let stat: fs.Stats;
  try {
    stat = fs.statSync(absolute);
  } catch {
    throw new ValidationError(`Folder not found: ${localFolder}`);
  }
  if (!stat.isDirectory()) throw new ValidationError(`Not a folder: ${localFolder}`);

  const matcher = new IgnoreMatcher(options.ignore ?? {});
  const rootName = path.basename(absolute);
  const plan: FolderPlan = {
    localFolder: absolute,
    rootName,
    steps: [
      { kind: FolderStepKind.CREATE_FOLDER, name: rootName, relPath: TOP_FOLDER, parentRelPath: null, localPath: absolute }
    ],
    folderCount: 1,
    fileCount: 0,
    ignoredCount: 0
  };

  const walk = (dir: string, rel: string): void => {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ValidationError(`Cannot read folder ${dir}: ${reason}`);
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    const dirs: FolderStep[] = [];
    const files: FolderStep[] = [];
    const descend: FolderStep[] = [];
    for (const entry of entries) {
      const childRel = rel === TOP_FOLDER ? entry.name : `${rel}/${entry.name}`;
      if ((options.skipHidden && isHiddenName(entry.name)) || matcher.isIgnored(`/${childRel}`)) {
        plan.ignoredCount += 1;
        continue;
      }
      const step = { name: entry.name, relPath: childRel, parentRelPath: rel, localPath: path.join(dir, entry.name) };
      const target = entry.isSymbolicLink() ? linkTarget(step.localPath) : entry;
      if (target?.isDirectory()) {
        const folder: FolderStep = { kind: FolderStepKind.CREATE_FOLDER, ...step };
        dirs.push(folder);
        if (!entry.isSymbolicLink()) descend.push(folder);
      } else if (target?.isFile()) {
        files.push({ kind: FolderStepKind.UPLOAD_FILE, ...step });
      } else {
        plan.ignoredCount += 1;
      }
    }

    plan.steps.push(...dirs, ...files);
    plan.folderCount += dirs.length;
    plan.fileCount += files.length;
    for (const sub of descend) walk(sub.localPath, sub.relPath);
  };

  walk(absolute, TOP_FOLDER);
  return plan;
}

function linkTarget(localPath: string): fs.Stats | undefined {
  try {
    return fs.statSync(localPath);
  } catch {
    return undefined;
  }
}
