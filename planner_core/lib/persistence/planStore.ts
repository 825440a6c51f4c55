import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { sha256Hex } from '../identity';
import { decodePlan } from './encodePlan';
import type { PersistedPlan } from './schema';

/** Latest plan per project, keyed by the resolved project path. */
export interface PlanStore {
    load(projectPath: string): Promise<PersistedPlan | null>;
    /** Stores the encoded plan text as-is and returns where it went. */
    save(projectPath: string, encodedPlan: string): Promise<string>;
}

export function planKey(projectPath: string): string {
    return sha256Hex(path.resolve(projectPath));
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export interface FilePlanStoreOptions {
    stateDir: string;
}

export class FilePlanStore implements PlanStore {
    private readonly stateDir: string;

    constructor(options: FilePlanStoreOptions) {
        this.stateDir = path.resolve(options.stateDir);
    }

    locate(projectPath: string): string {
        return path.join(this.stateDir, `${planKey(projectPath)}.plan.json`);
    }

    async load(projectPath: string): Promise<PersistedPlan | null> {
        let text: string;
        try {
            text = await readFile(this.locate(projectPath), 'utf8');
        } catch (error) {
            if (isMissingFile(error)) {
                return null;
            }
            throw error;
        }

        return decodePlan(text);
    }

    async save(projectPath: string, encodedPlan: string): Promise<string> {
        const target = this.locate(projectPath);
        const staging = `${target}.${process.pid}.tmp`;

        await mkdir(this.stateDir, { recursive: true });
        await writeFile(staging, encodedPlan, 'utf8');
        await rename(staging, target);

        return target;
    }
}

export class InMemoryPlanStore implements PlanStore {
    private readonly plans = new Map<string, string>();

    async load(projectPath: string): Promise<PersistedPlan | null> {
        const text = this.plans.get(planKey(projectPath));
        return text === undefined ? null : decodePlan(text);
    }

    async save(projectPath: string, encodedPlan: string): Promise<string> {
        const key = planKey(projectPath);
        this.plans.set(key, encodedPlan);
        return `memory://${key}`;
    }

    /** Raw stored text, for byte-level comparisons. */
    read(projectPath: string): string | undefined {
        return this.plans.get(planKey(projectPath));
    }

    /** Seeds raw text, including text that will not decode. */
    write(projectPath: string, text: string): void {
        this.plans.set(planKey(projectPath), text);
    }
}
