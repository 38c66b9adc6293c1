import { CompileError, formatCompileError } from "./errors.js";

export class DiagnosticReporter {
    reportCompileError(error: CompileError) {
        console.error(formatCompileError(error));
    }
}
