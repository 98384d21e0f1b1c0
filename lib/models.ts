export type DeploymentStatus = 'pending' | 'running' | 'success' | 'failed';

export type TriggerReason = 'poll' | 'manual';

export type NotificationEvent = 'success' | 'failure';

/**
 * Project model representing the projects table
 */
export interface Project {
    id: number;
    name: string;
    created_at: string; // ISO date string
}

/**
 * Repository row as stored in the repositories table. List-valued columns are
 * kept as JSON text; use `Repository` for the decoded form.
 */
export interface RepositoryRow {
    id: number;
    project_id: number;
    name: string;
    git_url: string;
    branch: string;
    path: string;
    local_path: string;
    check_interval: number;
    priority: number;
    env_file: string | null;
    token: string | null;
    last_commit_hash: string | null;
    notify_success: string; // JSON string[]
    notify_failure: string; // JSON string[]
    healthcheck_url: string | null;
    healthcheck_timeout: number; // seconds
    healthcheck_expected_status: number;
    created_at: string; // ISO date string
    updated_at: string; // ISO date string
}

/**
 * Repository with its project name, dependency ids and notification targets decoded
 */
export interface Repository {
    id: number;
    project_id: number;
    project_name: string;
    name: string;
    git_url: string;
    branch: string;
    path: string;
    local_path: string;
    check_interval: number;
    priority: number;
    env_file: string | null;
    token: string | null;
    last_commit_hash: string | null;
    depends_on: number[];
    notifications: Record<NotificationEvent, string[]>;
    healthcheck_url: string | null;
    healthcheck_timeout: number; // seconds
    healthcheck_expected_status: number;
}

/**
 * Deployment model representing the deployments table
 */
export interface Deployment {
    id: number;
    repository_id: number;
    commit_hash: string | null;
    status: DeploymentStatus;
    reason: TriggerReason;
    log: string;
    started_at: string | null; // ISO date string
    finished_at: string | null; // ISO date string
    created_at: string; // ISO date string
}

/**
 * Queued intent to deploy a repository. Lives only inside the queue.
 */
export interface DeploymentRequest {
    repositoryId: number;
    reason: TriggerReason;
    priority: number;
    enqueuedAt: number; // epoch millis
}

/**
 * What the notification sender receives about a finished deployment
 */
export interface DeploymentSummary {
    deploymentId: number;
    repositoryId: number;
    repositoryName: string;
    projectName: string;
    status: DeploymentStatus;
    commitHash: string | null;
    startedAt: string | null;
    finishedAt: string | null;
    durationSeconds: number | null;
    error?: string;
}

/**
 * Status view of one repository for reporting collaborators
 */
export interface RepositoryState {
    repository_id: number;
    name: string;
    project: string;
    branch: string;
    last_commit_hash: string | null;
    running: boolean;
    pending: boolean;
    latest_deployment: Deployment | null;
}
