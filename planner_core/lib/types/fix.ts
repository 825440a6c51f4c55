export type IacFormat = 'terraform' | 'kubernetes' | 'generic';

export interface DependencyFixAction {
    kind: 'dependency';
    summary: string;
    targetVersion: string | null;
    command: string;
    lockfileInstruction: string;
}

export interface ContainerImageFixAction {
    kind: 'container-image';
    summary: string;
    targetVersion: string | null;
    dockerfilePatch: string;
}

export interface IacResourceFixAction {
    kind: 'iac-resource';
    summary: string;
    targetVersion: string | null;
    format: IacFormat;
    manifestPatch: string;
}

export interface SecretExposureFixAction {
    kind: 'secret-exposure';
    summary: string;
    rotationCommand: string;
    removalCommand: string;
    gitignoreEntry: string;
}

export type FixAction =
    | DependencyFixAction
    | ContainerImageFixAction
    | IacResourceFixAction
    | SecretExposureFixAction;
