export class NotFoundError extends Error {
  public statusCode = 404;

  constructor(resource: string, id?: string) {
    super(id ? `${resource} with id '${id}' not found` : `${resource} not found`);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends Error {
  public statusCode = 400;
  public details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * Fatal setup problem: a missing workflow or complexity entry, an unknown
 * resource type, a calendar that never yields a working day.
 * Raised before simulated time advances.
 */
export class ConfigurationError extends Error {
  public statusCode = 422;
  public details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ConfigurationError';
    this.details = details;
  }
}

export class DuplicateIdError extends ConfigurationError {
  public statusCode = 409;

  constructor(entity: string, id: string) {
    super(`${entity} with id '${id}' already exists`, { id });
    this.name = 'DuplicateIdError';
  }
}

/** Direct booking on a resource that cannot take the hours on that date. */
export class AvailabilityError extends Error {
  public statusCode = 409;
  public resourceId: string;
  public date: string;
  public hours: number;

  constructor(resourceId: string, date: string, hours: number) {
    super(`Resource '${resourceId}' cannot take ${hours}h on ${date}`);
    this.name = 'AvailabilityError';
    this.resourceId = resourceId;
    this.date = date;
    this.hours = hours;
  }
}
