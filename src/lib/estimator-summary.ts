import { CREATED_TIME_PLACEHOLDER } from './configConstants';
import { resolveModelSummaryEndpoint } from './config-utils';
import { putModelSummary } from './model-summary-client';
import {
    EstimatorSummary,
    EstimatorVariant,
    SaveResult,
    SummaryFieldValue,
    SummaryView,
} from '../types/model-summary';
import { getLogger, SimpleLogger } from '../utils/logger';

export interface EstimatorSummaryOptions {
    /** Overrides the endpoint derived from `MODEL_SUMMARY_API_URL` and the variant. */
    endpoint?: string;
    logger?: SimpleLogger;
    /** Clock used to stamp `created_time`. Defaults to a microsecond wall clock. */
    now?: () => Date;
}

export class SummaryPreconditionError extends Error {
    readonly unsetFields: string[];

    constructor(unsetFields: string[]) {
        super('Set all properties before saving');
        this.name = 'SummaryPreconditionError';
        this.unsetFields = unsetFields;
    }
}

/**
 * UTC ISO-8601 at microsecond precision with an explicit `+00:00` offset,
 * e.g. `2024-03-01T10:15:30.123456+00:00`.
 */
export function formatCreatedTime(epochMicros: number): string {
    const micros = Math.floor(epochMicros);
    const millis = Math.floor(micros / 1000);
    const subMillis = String(micros - millis * 1000).padStart(3, '0');
    return new Date(millis).toISOString().replace(/Z$/, `${subMillis}+00:00`);
}

/** Wall-clock time in microseconds since the epoch. */
export function currentEpochMicros(): number {
    return Math.floor((performance.timeOrigin + performance.now()) * 1000);
}

/**
 * A field counts as set when it is truthy: non-empty string, non-zero number,
 * non-empty array. A genuine `0` therefore reads as unset.
 */
export function isFieldSet(value: SummaryFieldValue): boolean {
    if (Array.isArray(value)) return value.length > 0;
    return Boolean(value);
}

export function findUnsetFields(view: SummaryView): string[] {
    return Object.entries(view)
        .filter(([, value]) => !isFieldSet(value))
        .map(([field]) => field);
}

/**
 * Base for supervised-model summaries. Variants list their own fields in
 * `show()`; `save()` is shared and PUTs that view to `<base>/<variant>`.
 */
export abstract class SupervisedEstimatorSummary implements EstimatorSummary {
    abstract readonly variant: EstimatorVariant;

    name: string;
    desc: string;
    target: string;
    prediction: string;
    created_time: string;

    protected readonly logger: SimpleLogger;
    private readonly endpoint?: string;
    private readonly clock: () => number;
    private lastStampMicros = 0;

    protected constructor(
        fields: { name: string; desc: string; target: string; prediction: string; created_time?: string },
        options: EstimatorSummaryOptions = {},
    ) {
        this.name = fields.name;
        this.desc = fields.desc;
        this.target = fields.target;
        this.prediction = fields.prediction;
        this.created_time = fields.created_time ?? CREATED_TIME_PLACEHOLDER;
        this.endpoint = options.endpoint;
        this.logger = options.logger ?? getLogger('model-summary');
        const now = options.now;
        this.clock = now ? () => now().getTime() * 1000 : currentEpochMicros;
    }

    abstract show(): SummaryView;

    // Each save gets a later stamp than the one before, even on a coarse clock
    private nextStampMicros(): number {
        const micros = Math.max(this.clock(), this.lastStampMicros + 1);
        this.lastStampMicros = micros;
        return micros;
    }

    getEndpoint(): string {
        return this.endpoint ?? resolveModelSummaryEndpoint(this.variant);
    }

    /**
     * Checks every field is set, stamps `created_time` and PUTs the summary.
     * A rejection by the service resolves as `{ status: 'rejected' }`;
     * transport errors are thrown.
     */
    async save(): Promise<SaveResult> {
        const unsetFields = findUnsetFields(this.show());
        if (unsetFields.length > 0) {
            throw new SummaryPreconditionError(unsetFields);
        }

        this.created_time = formatCreatedTime(this.nextStampMicros());
        return putModelSummary(this.getEndpoint(), this.show(), this.logger);
    }
}
