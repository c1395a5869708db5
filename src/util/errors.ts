export class ArchpickError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArchpickError";
  }
}
