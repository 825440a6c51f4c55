export interface FindingIdentityInput {
    vulnId: string;
    ecosystem: string;
    name: string;
    version: string;
}

export type CanonicalHashInput = Record<string, unknown>;
