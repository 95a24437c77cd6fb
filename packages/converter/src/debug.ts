export interface DebugSnapshot {
    stage: string;
    fragments: string[];
    logs: string[];
}

let debugMode = false;
let debugLogs: string[] = [];
let debugSnapshots: DebugSnapshot[] = [];

export function setDebugMode(enabled: boolean) {
    debugMode = enabled;
}

export function isDebugMode(): boolean {
    return debugMode;
}

export function logDebug(message: string) {
    if (!debugMode) return;
    debugLogs.push(message);
}

export function getDebugSnapshots(): DebugSnapshot[] {
    return debugSnapshots;
}

export function resetDebugState() {
    debugMode = false;
    debugLogs = [];
    debugSnapshots = [];
}

// Copies the fragments; the live sequence keeps growing after the snapshot.
export function captureSnapshot(stage: string, fragments: readonly string[]) {
    if (!debugMode) return;
    debugSnapshots.push({
        stage,
        fragments: [...fragments],
        logs: [...debugLogs],
    });
    debugLogs = [];
}
