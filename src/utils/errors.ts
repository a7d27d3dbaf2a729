export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnknownOfficeError extends AppError {
  constructor(public officeId: string) {
    super(404, `Unknown office: ${officeId}`);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(500, message);
  }
}
