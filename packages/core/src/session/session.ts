// ============================================================================
// Reconciliation Session
// ============================================================================

import { randomUUID } from "node:crypto";
import { detectTable, extractCandidates } from "../detector";
import {
	IncompleteMappingError,
	InvalidSnapshotError,
	InvalidTransitionError,
	LoaderFailedError,
	RuleStoreUnavailableError,
} from "../errors";
import type { Logger } from "../logger";
import { errorContext, silentLogger } from "../logger";
import type { MatchProposal } from "../matcher";
import { assignInitialMappings, matchColumns } from "../matcher";
import { knownHeaders } from "../registry";
import { loadRuleSnapshot } from "../rules";
import type { CanonicalSchema, ColumnMapping, RawGrid } from "../types";
import { buildLoadRequest, describeIssues } from "./handoff";
import { parseSnapshot, toSnapshot } from "./snapshot";
import type { PendingRuleWrite } from "./state-machine";
import {
	createInitialState,
	missingRequiredFields,
	pendingRuleWrites,
	sessionReducer,
	suggestionsFor,
} from "./state-machine";
import type {
	SessionAction,
	SessionDependencies,
	SessionOptions,
	SessionRepository,
	SessionSnapshot,
	SessionState,
	SessionStatus,
	SessionView,
	TransitionResult,
} from "./types";

const DEFAULT_RULE_WRITE_ATTEMPTS = 3;

interface ResolvedSessionOptions {
	sessionId: string;
	detect: NonNullable<SessionOptions["detect"]>;
	match: NonNullable<SessionOptions["match"]>;
	sampleSize: number | undefined;
	ruleWriteAttempts: number;
	now: () => Date;
}

function resolveSessionOptions(options?: SessionOptions): ResolvedSessionOptions {
	return {
		sessionId: options?.sessionId ?? randomUUID(),
		detect: options?.detect ?? {},
		match: options?.match ?? {},
		sampleSize: options?.sampleSize,
		ruleWriteAttempts: Math.max(1, options?.ruleWriteAttempts ?? DEFAULT_RULE_WRITE_ATTEMPTS),
		now: options?.now ?? (() => new Date()),
	};
}

/**
 * Drives one spreadsheet through detection, matching, human resolution and finalization.
 *
 * Every command returns a `TransitionResult`: rejected commands leave the session unchanged.
 * With a repository configured, the session saves a snapshot after every successful
 * transition; a failing save rejects the returned promise.
 *
 * @example
 * ```ts
 * const session = ReconciliationSession.create(schema, { rules, loader });
 * await session.receiveGrid(grid, "sales-q1.xlsx");
 * await session.confirm(2, "transaction_date");
 * const result = await session.finalize();
 * ```
 */
export class ReconciliationSession {
	readonly schema: CanonicalSchema;
	private current: SessionState;
	private readonly deps: SessionDependencies;
	private readonly logger: Logger;
	private readonly options: ResolvedSessionOptions;

	private constructor(
		state: SessionState,
		schema: CanonicalSchema,
		deps: SessionDependencies,
		options: ResolvedSessionOptions
	) {
		this.current = state;
		this.schema = schema;
		this.deps = deps;
		this.logger = deps.logger ?? silentLogger;
		this.options = options;
	}

	// ============================================================
	// Construction
	// ============================================================

	static create(
		schema: CanonicalSchema,
		deps: SessionDependencies,
		options?: SessionOptions
	): ReconciliationSession {
		const resolved = resolveSessionOptions(options);
		const state = createInitialState(resolved.sessionId, schema.schemaId, resolved.now());
		return new ReconciliationSession(state, schema, deps, resolved);
	}

	/**
	 * Rebuild a session from a snapshot. A session restored in `Detecting` or
	 * `Matching` continues with `resume()`.
	 *
	 * @throws InvalidSnapshotError when the snapshot is malformed or belongs to another schema
	 */
	static restore(
		snapshot: unknown,
		schema: CanonicalSchema,
		deps: SessionDependencies,
		options?: SessionOptions
	): ReconciliationSession {
		const state = parseSnapshot(snapshot);
		if (state.schemaId !== schema.schemaId) {
			throw new InvalidSnapshotError([
				`schemaId: session belongs to "${state.schemaId}", not "${schema.schemaId}"`,
			]);
		}
		const fieldNames = new Set(schema.fields.map((f) => f.fieldName));
		const unknown = state.mappings
			.map((m) => m.targetField)
			.filter((field): field is string => field !== null && !fieldNames.has(field));
		if (unknown.length > 0) {
			throw new InvalidSnapshotError(unknown.map((field) => `mappings: unknown field "${field}"`));
		}

		const resolved = resolveSessionOptions({ ...options, sessionId: state.sessionId });
		return new ReconciliationSession(state, schema, deps, resolved);
	}

	/**
	 * Restore a saved session from the repository, or null when none is stored under the id.
	 */
	static async load(
		sessionId: string,
		schema: CanonicalSchema,
		deps: SessionDependencies & { repository: SessionRepository },
		options?: SessionOptions
	): Promise<ReconciliationSession | null> {
		const snapshot = await deps.repository.load(sessionId);
		if (snapshot === null) {
			return null;
		}
		return ReconciliationSession.restore(snapshot, schema, deps, options);
	}

	// ============================================================
	// Accessors
	// ============================================================

	get sessionId(): string {
		return this.current.sessionId;
	}

	get status(): SessionStatus {
		return this.current.status;
	}

	get state(): SessionView {
		return this.current;
	}

	get mappings(): readonly ColumnMapping[] {
		return this.current.mappings;
	}

	get warnings(): readonly string[] {
		return this.current.warnings;
	}

	/** Ranked proposals for a column, minus the fields rejected for it. */
	suggestions(columnIndex: number): MatchProposal[] {
		return suggestionsFor(this.current, columnIndex);
	}

	toSnapshot(): SessionSnapshot {
		return toSnapshot(this.current);
	}

	// ============================================================
	// Detection & Matching
	// ============================================================

	/**
	 * Accept the raw grid and run detection and matching. Ends in `AwaitingResolution`,
	 * or in `Abandoned` with the detection error when no usable table is found.
	 */
	async receiveGrid(grid: RawGrid, sourceName?: string): Promise<TransitionResult> {
		const received = await this.dispatch({ type: "RECEIVE_GRID", grid, sourceName: sourceName ?? null });
		if (!received.ok) {
			return received;
		}
		return this.resume();
	}

	/**
	 * Continue an interrupted detection or matching step.
	 */
	async resume(): Promise<TransitionResult> {
		if (this.current.status === "Detecting") {
			const detected = await this.detect();
			if (!detected.ok || detected.state.status !== "Matching") {
				return detected;
			}
		}
		if (this.current.status === "Matching") {
			return this.match();
		}
		return { ok: false, error: new InvalidTransitionError(this.current.status, "resume") };
	}

	private async detect(): Promise<TransitionResult> {
		const { grid } = this.current;
		if (!grid) {
			return { ok: false, error: new InvalidTransitionError(this.current.status, "detect without a grid") };
		}

		const detectOptions = {
			...this.options.detect,
			knownHeaders: this.options.detect.knownHeaders ?? knownHeaders(this.schema),
		};
		const detection = detectTable(grid, detectOptions);

		if (!detection.ok) {
			this.logger.warn("no usable table in grid", {
				sessionId: this.sessionId,
				code: detection.error.code,
				reason: detection.error.message,
			});
			const failed = await this.dispatch({ type: "DETECTION_FAILED", error: detection.error.toInfo() });
			return failed.ok ? { ok: false, error: detection.error } : failed;
		}

		const { table } = detection;
		this.logger.debug("table detected", {
			sessionId: this.sessionId,
			headerRowIndex: table.headerRowIndex,
			dataRows: table.dataRowRange.end - table.dataRowRange.start,
			columnCount: table.columnCount,
		});
		const candidates = extractCandidates(grid, table, this.options.sampleSize);
		return this.dispatch({ type: "DETECTION_SUCCEEDED", table, candidates });
	}

	private async match(): Promise<TransitionResult> {
		const { candidates } = this.current;
		const { snapshot, failures } = await loadRuleSnapshot(
			this.deps.rules,
			this.schema.schemaId,
			candidates.map((c) => c.normalizedHeader)
		);

		const warnings = failures.map(({ normalizedHeader, error }) => {
			this.logger.warn("rule lookup failed; matching without history", {
				sessionId: this.sessionId,
				header: normalizedHeader,
				...errorContext(error),
			});
			return `Rule lookup failed for "${normalizedHeader}": ${error.message}`;
		});

		const result = matchColumns(candidates, this.schema, snapshot, this.options.match);
		for (const rule of result.staleRules) {
			this.logger.info("ignoring rule for a field the schema no longer has", {
				sessionId: this.sessionId,
				header: rule.normalizedHeaderText,
				targetField: rule.targetFieldName,
			});
		}

		const mappings = assignInitialMappings(result.columns, this.schema);
		this.logger.info("columns matched", {
			sessionId: this.sessionId,
			autoResolvable: result.autoResolvable,
			needsReview: result.needsReview,
			unmatched: result.unmatched,
		});

		return this.dispatch({
			type: "MATCHING_COMPLETED",
			proposals: result.columns,
			mappings,
			warnings,
		});
	}

	// ============================================================
	// Human Decisions
	// ============================================================

	/** Match a column to a field. Fails with `MappingConflict` when another column holds it. */
	confirm(columnIndex: number, targetField: string): Promise<TransitionResult> {
		return this.dispatch({ type: "CONFIRM", columnIndex, targetField });
	}

	/** Clear a column's match and stop suggesting the rejected field for it. */
	reject(columnIndex: number): Promise<TransitionResult> {
		return this.dispatch({ type: "REJECT", columnIndex });
	}

	/** Exclude a column from the load. */
	skip(columnIndex: number): Promise<TransitionResult> {
		return this.dispatch({ type: "SKIP", columnIndex });
	}

	/** Clear a column's match without rejecting the field. */
	unassign(columnIndex: number): Promise<TransitionResult> {
		return this.dispatch({ type: "UNASSIGN", columnIndex });
	}

	abandon(reason: string): Promise<TransitionResult> {
		return this.dispatch({ type: "ABANDON", reason });
	}

	// ============================================================
	// Finalization
	// ============================================================

	/**
	 * Hand the data to the loader, persist the confirmed rules and close the session.
	 *
	 * The loader runs first: a `LoaderFailed` finalize has persisted nothing, and the
	 * session can still be edited or abandoned. Once the handoff or a rule write has gone
	 * through, the session only accepts `finalize`. A finalize retried after
	 * `RuleStoreUnavailable` neither loads the data again nor repeats applied rule writes.
	 * On failure the session stays in `AwaitingResolution`.
	 */
	async finalize(): Promise<TransitionResult> {
		if (this.current.status !== "AwaitingResolution") {
			return { ok: false, error: new InvalidTransitionError(this.current.status, "finalize") };
		}

		const missing = missingRequiredFields(this.current.mappings, this.schema);
		if (missing.length > 0) {
			return { ok: false, error: new IncompleteMappingError(missing) };
		}

		if (!this.current.handoffCompleted) {
			const handoff = await this.handOff();
			if (!handoff.ok) {
				return handoff;
			}
		}

		for (const write of pendingRuleWrites(this.current)) {
			const failure = await this.writeRule(write);
			if (failure) {
				this.logger.error("finalize stopped: rule store unavailable", {
					sessionId: this.sessionId,
					header: write.normalizedHeader,
					attempts: this.options.ruleWriteAttempts,
				});
				return { ok: false, error: failure };
			}
			const applied = await this.dispatch({
				type: "RULE_WRITE_APPLIED",
				normalizedHeader: write.normalizedHeader,
			});
			if (!applied.ok) {
				return applied;
			}
		}

		const finalized = await this.dispatch({ type: "FINALIZE" });
		if (finalized.ok) {
			this.logger.info("session finalized", {
				sessionId: this.sessionId,
				rulesWritten: finalized.state.appliedRuleWrites.length,
			});
		}
		return finalized;
	}

	private async handOff(): Promise<TransitionResult> {
		const { loader } = this.deps;
		const { grid, table } = this.current;
		if (!loader || !grid || !table) {
			return { ok: true, state: this.current };
		}

		const request = buildLoadRequest({
			schema: this.schema,
			grid,
			table,
			mappings: this.current.mappings,
			sourceName: this.current.sourceName,
		});
		try {
			await loader.load(request);
		} catch (error) {
			this.logger.error("finalize stopped: loader failed", {
				sessionId: this.sessionId,
				targetTableName: request.targetTableName,
				...errorContext(error),
			});
			return { ok: false, error: new LoaderFailedError(error) };
		}

		const warnings = describeIssues(request.issues);
		if (warnings.length > 0) {
			this.logger.warn("loaded with unconvertible values", {
				sessionId: this.sessionId,
				targetTableName: request.targetTableName,
				issues: request.issues.length,
			});
		}
		return this.dispatch({ type: "HANDOFF_COMPLETED", warnings });
	}

	private async writeRule(write: PendingRuleWrite): Promise<RuleStoreUnavailableError | null> {
		const { rules } = this.deps;
		const { schemaId } = this.schema;
		let lastError: unknown;

		for (let attempt = 1; attempt <= this.options.ruleWriteAttempts; attempt++) {
			try {
				const confirmedAt = this.options.now();
				if (write.kind === "upsert") {
					await rules.upsert({
						schemaId,
						normalizedHeaderText: write.normalizedHeader,
						targetFieldName: write.targetField,
						confirmedAt,
					});
				} else {
					const reinforced = await rules.reinforce(
						schemaId,
						write.normalizedHeader,
						write.targetField,
						confirmedAt
					);
					if (!reinforced) {
						this.logger.info("rule changed since matching; not reinforced", {
							sessionId: this.sessionId,
							header: write.normalizedHeader,
							targetField: write.targetField,
						});
					}
				}
				return null;
			} catch (error) {
				lastError = error;
				this.logger.warn("rule write failed", {
					sessionId: this.sessionId,
					header: write.normalizedHeader,
					attempt,
					...errorContext(error),
				});
			}
		}

		return lastError instanceof RuleStoreUnavailableError
			? lastError
			: new RuleStoreUnavailableError(write.kind, lastError);
	}

	// ============================================================
	// Dispatch
	// ============================================================

	private async dispatch(action: SessionAction): Promise<TransitionResult> {
		const result = sessionReducer(this.current, action, this.schema);
		if (!result.ok) {
			this.logger.debug("action rejected", {
				sessionId: this.sessionId,
				action: action.type,
				code: result.error.code,
			});
			return result;
		}

		const from = this.current.status;
		this.current = result.state;
		if (from !== result.state.status) {
			this.logger.debug("status changed", { sessionId: this.sessionId, from, to: result.state.status });
		}
		if (this.deps.repository) {
			await this.deps.repository.save(toSnapshot(this.current));
		}
		return result;
	}
}
