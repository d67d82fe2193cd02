// --- Shared Types (agent and controller) ---

export * from './actions';
export * from './system';
