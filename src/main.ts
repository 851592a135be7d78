// src/main.ts

// Import logger first to ensure logging is available early
import { logger } from './utils/logger';

import { CONFIG } from './config';
import { FrameLoop } from './core/frame_loop';
import { InputManager } from './core/input_manager';
import { InputStateTracker } from './core/input_state_tracker';
import { LocalEngine } from './engine/local_engine';
import { RendererFacade } from './rendering/renderer_facade';
import { ViewportScaler } from './rendering/viewport_scaler';

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function showStatus(statusBar: HTMLElement | null, message: string, isError: boolean): void {
    if (!statusBar) return;
    statusBar.textContent = message;
    statusBar.style.color = isError ? 'red' : '';
    statusBar.style.backgroundColor = isError ? 'black' : '';
}

logger.info("main.ts executing...");

window.onload = () => {
    logger.info("DOM fully loaded.");
    const statusBar = document.getElementById('statusBar');

    try {
        const scaler = ViewportScaler.forMonitor(window.screen.availWidth, window.screen.availHeight);
        const facade = new RendererFacade('display', scaler);
        const input = new InputManager(() => facade.getCanvas().getBoundingClientRect());
        const engine = new LocalEngine(CONFIG.SEED);

        const loop = new FrameLoop({
            engine,
            input,
            tracker: new InputStateTracker(engine, scaler),
            presenter: facade,
            onStop: () => {
                input.stopListening();
                showStatus(statusBar, 'Session ended. Reload the page to start again.', false);
            },
            onFatal: error => {
                input.stopListening();
                showStatus(statusBar, `FATAL ERROR: ${describeError(error)}. See console (F12).`, true);
            },
        });

        input.startListening();
        loop.start();
        showStatus(statusBar, 'WASD/Arrows: Move  Space/Click: Fire  P: Save log  ESC: Quit', false);
        logger.info(`Frame loop started at ${scaler.viewport.width}x${scaler.viewport.height}.`);
    } catch (error) {
        logger.error(`Failed to initialise session: ${describeError(error)}`);
        showStatus(statusBar, `FATAL ERROR: ${describeError(error)}. See console (F12).`, true);
    }
};

window.addEventListener('error', (event) => {
    logger.error(`Unhandled window error: ${event.message}`, { error: String(event.error) });
});
window.addEventListener('unhandledrejection', (event) => {
    logger.error(`Unhandled promise rejection: ${String(event.reason)}`);
});

logger.info("main.ts finished initial execution.");
