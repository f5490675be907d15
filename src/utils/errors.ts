class CustomErrors extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message
    };
  }
}

export class ValidationError extends CustomErrors {}

export class NotFoundError extends CustomErrors {}

export class ForbiddenError extends CustomErrors {}

export class UnauthorizedError extends CustomErrors {}
