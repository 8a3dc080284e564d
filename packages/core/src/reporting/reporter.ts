/**
 * Scenario Reporter
 *
 * Interface and implementations for reporting step execution.
 */

import type { StepResult } from "../results/result.types";
import { describeStep } from "../steps/step.factory";
import type { StepSpecification } from "../steps/step.types";

/**
 * Summary of one executed step
 */
export interface StepReport {
	scenarioId: string;
	stepNumber: number;
	kind: StepSpecification["kind"];
	description: string;
	passed: boolean;
	duration: number;
	errors: readonly string[];
}

export function createStepReport(
	scenarioId: string,
	stepNumber: number,
	step: StepSpecification,
	result: StepResult
): StepReport {
	return {
		scenarioId,
		stepNumber,
		kind: step.kind,
		description: describeStep(step),
		passed: result.success,
		duration: result.metadata.durationMs,
		errors: result.errors,
	};
}

/**
 * Scenario Reporter Interface
 */
export interface ScenarioReporter {
	/** Reporter name */
	readonly name: string;

	/** Called before a step is handed to its transport */
	onStepStart?(step: StepSpecification, scenarioId: string): void;

	/** Called when a step has a result, successful or not */
	onStepComplete(report: StepReport, result: StepResult): void;

	/** Called when execution raises instead of producing a result */
	onError?(error: Error, scenarioId: string): void;
}

/**
 * Console Reporter
 *
 * Outputs step outcomes to console with formatting.
 */
export class ConsoleReporter implements ScenarioReporter {
	readonly name = "console";
	private verbose: boolean;

	constructor(options?: { verbose?: boolean }) {
		this.verbose = options?.verbose ?? false;
	}

	onStepStart(step: StepSpecification): void {
		if (this.verbose) {
			console.log(`  ▶ ${describeStep(step)}`);
		}
	}

	onStepComplete(report: StepReport): void {
		const icon = report.passed ? "✓" : "✗";
		const color = report.passed ? "\x1b[32m" : "\x1b[31m";
		const reset = "\x1b[0m";
		console.log(`  ${color}${icon}${reset} ${report.description} (${report.duration}ms)`);

		if (!report.passed) {
			for (const error of report.errors) {
				console.log(`     ${error}`);
			}
		}
	}

	onError(error: Error): void {
		console.error(`\n❌ Error: ${error.message}\n`);
	}
}

/**
 * JSON Reporter
 *
 * Outputs one JSON line per step.
 */
export class JsonReporter implements ScenarioReporter {
	readonly name = "json";
	private output: string[] = [];
	private prettyPrint: boolean;

	constructor(options?: { prettyPrint?: boolean }) {
		this.prettyPrint = options?.prettyPrint ?? false;
	}

	onStepComplete(report: StepReport): void {
		const json = this.prettyPrint ? JSON.stringify(report, null, 2) : JSON.stringify(report);
		this.output.push(json);
		console.log(json);
	}

	/**
	 * Get the JSON output
	 */
	getOutput(): string {
		return this.output.join("\n");
	}
}

/**
 * Silent Reporter
 *
 * Does not output anything (useful for testing).
 */
export class SilentReporter implements ScenarioReporter {
	readonly name = "silent";
	private reports: StepReport[] = [];
	private errors: Error[] = [];

	onStepComplete(report: StepReport): void {
		this.reports.push(report);
	}

	onError(error: Error): void {
		this.errors.push(error);
	}

	/**
	 * Get collected step reports
	 */
	getReports(): StepReport[] {
		return this.reports;
	}

	/**
	 * Get collected errors
	 */
	getErrors(): Error[] {
		return this.errors;
	}

	/**
	 * Get last report
	 */
	getLastReport(): StepReport | undefined {
		return this.reports[this.reports.length - 1];
	}
}

/**
 * Composite Reporter
 *
 * Combines multiple reporters.
 */
export class CompositeReporter implements ScenarioReporter {
	readonly name = "composite";
	private reporters: ScenarioReporter[];

	constructor(reporters: ScenarioReporter[]) {
		this.reporters = reporters;
	}

	onStepStart(step: StepSpecification, scenarioId: string): void {
		for (const reporter of this.reporters) {
			reporter.onStepStart?.(step, scenarioId);
		}
	}

	onStepComplete(report: StepReport, result: StepResult): void {
		for (const reporter of this.reporters) {
			reporter.onStepComplete(report, result);
		}
	}

	onError(error: Error, scenarioId: string): void {
		for (const reporter of this.reporters) {
			reporter.onError?.(error, scenarioId);
		}
	}

	/**
	 * Add a reporter
	 */
	addReporter(reporter: ScenarioReporter): void {
		this.reporters.push(reporter);
	}

	/**
	 * Remove a reporter by name
	 */
	removeReporter(name: string): void {
		this.reporters = this.reporters.filter((r) => r.name !== name);
	}
}
