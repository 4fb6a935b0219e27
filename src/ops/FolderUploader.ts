import type { BatchJob, BatchReport, BatchSink } from '../types/operations.js';
import type { RemoteStorageService } from '../types/remote.js';
import type { EntryId, FolderId } from '../types/ids.js';
import { BatchKind, ErrorCode, ErrorStage } from '../types/enums.js';
import type { CancellableOperation } from './CancellableOperation.js';
import type { OperationRunner } from './OperationRunner.js';
import { RemoteError } from './errors.js';
import { FolderStepKind, TOP_FOLDER, type FolderPlan, type FolderStep } from './folderPlan.js';

export interface FolderUploadResult {
  report: BatchReport;
  /** Remote id of the top folder, when it was created. */
  folderId?: EntryId;
}

export function folderStepPath(plan: FolderPlan, step: FolderStep): string {
  return step.relPath === TOP_FOLDER ? plan.rootName : step.relPath;
}

export class FolderUploader {
  constructor(private readonly service: RemoteStorageService, private readonly runner: OperationRunner) {}

  async upload(
    operation: CancellableOperation,
    plan: FolderPlan,
    destinationId: FolderId,
    sink: BatchSink
  ): Promise<FolderUploadResult> {
    const folderIds = new Map<string, EntryId>();

    const job: BatchJob<FolderStep> = {
      kind: BatchKind.FOLDER_UPLOAD,
      items: plan.steps,
      stage: ErrorStage.UPLOAD,
      refreshOnSuccess: true,
      subject: (step) => folderStepPath(plan, step),
      label: (step, index, total) => {
        const verb = step.kind === FolderStepKind.CREATE_FOLDER ? 'Creating folder' : 'Uploading';
        return `${verb}: ${folderStepPath(plan, step)} (${index + 1}/${total})`;
      },
      perform: async (step) => {
        const parentId = step.parentRelPath === null ? destinationId : folderIds.get(step.parentRelPath);
        if (parentId === undefined) {
          const parent = step.parentRelPath === null || step.parentRelPath === TOP_FOLDER ? plan.rootName : step.parentRelPath;
          throw new RemoteError({ code: ErrorCode.NOT_FOUND, message: `Parent folder was not created: ${parent}` });
        }
        if (step.kind === FolderStepKind.CREATE_FOLDER) {
          folderIds.set(step.relPath, await this.service.createFolder(step.name, parentId));
        } else {
          await this.service.upload(step.localPath, parentId);
        }
      }
    };

    const report = await this.runner.run(operation, job, sink);
    const folderId = folderIds.get(TOP_FOLDER);
    return folderId === undefined ? { report } : { report, folderId };
  }
}
