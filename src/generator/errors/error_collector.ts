/**
 * Diagnostic collector for bridge generation
 */

import {
  AggregateGeneratorError,
  type GeneratorError,
} from "./generator_errors.js";

export class ErrorCollector {
  private diagnostics: GeneratorError[] = [];

  add(error: GeneratorError): void {
    this.diagnostics.push(error);
  }

  hasErrors(): boolean {
    return this.diagnostics.some((d) => d.severity === "error");
  }

  getErrors(): GeneratorError[] {
    return this.diagnostics.filter((d) => d.severity === "error");
  }

  getDiagnostics(): GeneratorError[] {
    return [...this.diagnostics];
  }

  throwIfErrors(): void {
    const errors = this.getErrors();
    if (errors.length > 0) {
      throw new AggregateGeneratorError(errors);
    }
  }
}
