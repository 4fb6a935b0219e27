export type EntryId = string;
export type FolderId = string;
export type RowHandle = string;
export type Instant = string;

export const ROOT_FOLDER_ID: FolderId = 'root';
export const ROOT_FOLDER_NAME = 'Root';
