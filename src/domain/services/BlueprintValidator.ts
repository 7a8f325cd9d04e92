import Ajv, { ErrorObject } from 'ajv';
import blueprintSchema from '../../../schemas/blueprint.schema.json';
import {
    Blueprint,
    DEFAULT_KEN_BURNS,
    DEFAULT_VOICE_SETTINGS,
} from '../entities/Blueprint';
import { PipelineContext } from '../entities/StageRecord';
import { ValidationIssue } from '../errors/PipelineErrors';
import { validateCropRect } from './KenBurns';

const ajv = new Ajv({ allErrors: true });
const validateStructure = ajv.compile<Blueprint>(blueprintSchema);

function toIssue(error: ErrorObject): ValidationIssue {
    if (error.keyword === 'additionalProperties' && typeof error.params.additionalProperty === 'string') {
        return { path: error.instancePath, message: `has unknown property "${error.params.additionalProperty}"` };
    }
    if (error.keyword === 'required' && typeof error.params.missingProperty === 'string') {
        return { path: error.instancePath, message: `is missing "${error.params.missingProperty}"` };
    }
    return { path: error.instancePath, message: error.message ?? error.keyword };
}

/**
 * Semantic rules the schema cannot express.
 */
function validateSemantics(blueprint: Blueprint, expected?: PipelineContext): ValidationIssue[] {
    const issues: ValidationIssue[] = [];

    if (expected && blueprint.projectName !== expected.project) {
        issues.push({ path: '/projectName', message: `must be "${expected.project}"` });
    }
    if (expected && blueprint.version !== expected.version) {
        issues.push({ path: '/version', message: `must be "${expected.version}"` });
    }

    if (blueprint.shots.length === 0) {
        issues.push({ path: '/shots', message: 'must contain at least one shot' });
        return issues;
    }

    // Indices must be unique and form 0..N-1
    const seen = new Set<number>();
    blueprint.shots.forEach((shot, i) => {
        if (seen.has(shot.index)) {
            issues.push({ path: `/shots/${i}/index`, message: `duplicates shot index ${shot.index}` });
        }
        seen.add(shot.index);
    });
    const n = blueprint.shots.length;
    for (let expectedIndex = 0; expectedIndex < n; expectedIndex++) {
        if (!seen.has(expectedIndex)) {
            issues.push({ path: '/shots', message: `indices must be contiguous 0..${n - 1}; missing ${expectedIndex}` });
        }
    }

    blueprint.shots.forEach((shot, i) => {
        if (shot.narration.trim().length === 0) {
            issues.push({ path: `/shots/${i}/narration`, message: 'must not be empty' });
        }
        for (const edge of ['start', 'end'] as const) {
            for (const problem of validateCropRect(shot.kenBurns[edge])) {
                issues.push({ path: `/shots/${i}/kenBurns/${edge}`, message: problem });
            }
        }
    });

    return issues;
}

/**
 * Validates a blueprint document. Returns every issue found; empty means valid.
 */
export function validateBlueprint(candidate: unknown, expected?: PipelineContext): ValidationIssue[] {
    if (!validateStructure(candidate)) {
        return (validateStructure.errors ?? []).map(toIssue);
    }
    return validateSemantics(candidate, expected);
}

export function isValidBlueprint(candidate: unknown, expected?: PipelineContext): candidate is Blueprint {
    return validateBlueprint(candidate, expected).length === 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Fills the fields a draft author may leave out: status, timestamps,
 * voice settings and Ken Burns parameters. Unknown shapes pass through
 * untouched so validation reports them.
 */
export function applyBlueprintDefaults(input: unknown, now: Date = new Date()): unknown {
    if (!isRecord(input)) {
        return input;
    }
    const timestamp = now.toISOString();
    const shots = Array.isArray(input.shots)
        ? input.shots.map((shot: unknown) => {
            if (!isRecord(shot)) {
                return shot;
            }
            return {
                ...shot,
                voiceSettings: isRecord(shot.voiceSettings)
                    ? { ...DEFAULT_VOICE_SETTINGS, ...shot.voiceSettings }
                    : shot.voiceSettings ?? { ...DEFAULT_VOICE_SETTINGS },
                kenBurns: shot.kenBurns ?? {
                    start: { ...DEFAULT_KEN_BURNS.start },
                    end: { ...DEFAULT_KEN_BURNS.end },
                    easing: DEFAULT_KEN_BURNS.easing,
                },
            };
        })
        : input.shots;

    return {
        status: 'draft',
        description: '',
        createdAt: timestamp,
        ...input,
        updatedAt: timestamp,
        shots,
    };
}
