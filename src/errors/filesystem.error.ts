import { SyncError } from './sync.error';

/**
 * Local I/O failure while comparing, staging or copying files
 */
export class FileSystemError extends SyncError {
  public readonly code: string = 'FILESYSTEM_ERROR';
  public readonly recoverable: boolean = true;
  public readonly kind = 'FileSystem';
  public readonly path: string;

  constructor(message: string, operation: string, path: string, details?: string) {
    super(message, operation, details);
    this.path = path;
  }
}

export class FileNotFoundError extends FileSystemError {
  public override readonly code: string = 'FILE_NOT_FOUND';
  public override readonly recoverable: boolean = false;
}

export class PermissionError extends FileSystemError {
  public override readonly code: string = 'PERMISSION_DENIED';
  public override readonly recoverable: boolean = false;
}
