export class ScanError extends Error {
  public readonly status: number;

  constructor(message: string, status = 500) {
    super(message);
    this.name = "ScanError";
    this.status = status;
  }
}

export class InvalidImageError extends ScanError {
  constructor(message = "Invalid image data") {
    super(message, 400);
    this.name = "InvalidImageError";
  }
}
