// src/export/replay-guard.ts

/**
 * Page-script helper shared by the exported templates: one state entry that
 * fails to replay is logged and the rest still load.
 */
export const REPLAY_GUARD_SCRIPT = `
function guard(label, replay) {
    try {
        replay();
    } catch (error) {
        console.warn('Could not replay ' + label, error);
    }
}
`;
