export class DirTreeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidArgumentError extends DirTreeError {}

export class PathNotFoundError extends DirTreeError {
  readonly path: string;

  constructor(targetPath: string) {
    super(`Path does not exist: ${targetPath}`);
    this.path = targetPath;
  }
}
