/**
 * billsort CLI - Core Types
 */

export interface GlobalOptions {
    workspace?: string;
}

export interface SuggestOptions extends GlobalOptions {
    type?: string;
}

export interface RecordOptions extends GlobalOptions {
    person?: string;
    source?: string;
    amount?: number;
    manual?: boolean;
    prior?: string;
}

export interface RulesOptions extends GlobalOptions {
    limit?: number;
}

export interface WorkspaceConfig {
    configPath: string;
}

export interface Workspace {
    root: string;
    data: string;
    config: WorkspaceConfig;
}

export interface StoragePaths {
    rulesPath: string;
    historyPath: string;
}
