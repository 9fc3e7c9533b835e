export class TemplateMissingError extends Error {
  readonly templatePath: string;

  constructor(templatePath: string) {
    super(`Template file not found: ${templatePath}`);
    this.name = "TemplateMissingError";
    this.templatePath = templatePath;
  }
}

export class TemplateFormatError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TemplateFormatError";
  }
}

export class HaloApiError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(`HaloPSA API error (${status}): ${message}`);
    this.name = "HaloApiError";
    this.status = status;
  }
}

export class RecommendationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RecommendationError";
  }
}
