import type { FolderId } from '../types/ids.js';
import { ROOT_FOLDER_ID, ROOT_FOLDER_NAME } from '../types/ids.js';
import { ValidationError } from '../ops/errors.js';

export interface FolderLocation {
  readonly folderId: FolderId;
  readonly folderName: string;
}

export const ROOT_LOCATION: FolderLocation = Object.freeze({ folderId: ROOT_FOLDER_ID, folderName: ROOT_FOLDER_NAME });

/**
 * Current folder plus a LIFO history of the folders navigated away from.
 * Only forward navigation pushes and only `goBack` pops; nothing is ever
 * removed from the middle of the stack.
 */
export class NavigationState {
  private location: FolderLocation;
  private readonly stack: FolderLocation[] = [];

  constructor(initial: FolderLocation = ROOT_LOCATION) {
    this.location = initial;
  }

  get current(): FolderLocation {
    return this.location;
  }

  get currentFolderId(): FolderId {
    return this.location.folderId;
  }

  get currentFolderName(): string {
    return this.location.folderName;
  }

  get history(): readonly FolderLocation[] {
    return this.stack;
  }

  get canGoBack(): boolean {
    return this.stack.length > 0;
  }

  navigateInto(folderId: FolderId, folderName: string): void {
    if (!folderId) throw new ValidationError('Folder ID cannot be empty');
    this.stack.push(this.location);
    this.location = { folderId, folderName };
  }

  goBack(): boolean {
    const previous = this.stack.pop();
    if (!previous) return false;
    this.location = previous;
    return true;
  }

  goHome(): void {
    this.stack.length = 0;
    this.location = ROOT_LOCATION;
  }

  path(separator = ' / '): string {
    return [...this.stack, this.location].map((loc) => loc.folderName).join(separator);
  }
}
