import $ from "jquery";
import Viewer from "../core/Viewer";
import { describeError } from "../core/errors";
import type { LogLevel } from "../services/logger";

/**
 * Browser host: binds a canvas, mouse drags, window resizes and a file
 * picker / drop target to the viewer and drives the frame loop.
 */
export default class App {

    canvas: HTMLCanvasElement;
    viewer: Viewer;

    stateLabel: JQuery<HTMLElement>;
    logContent: JQuery<HTMLElement>;
    maxLogEntries = 50;

    dragging: boolean = false;
    lastX: number = 0;
    lastY: number = 0;

    constructor(canvas: HTMLCanvasElement) {
        this.canvas = canvas;
        this.stateLabel = $("#viewer-state");
        this.logContent = $("#log-content");
        this.viewer = Viewer.create(this.canvas, {
            onStatus: (message, level) => this.statusLog(message, level)
        });
    }

    init() {
        this.handleResize();
        this.viewer.loadPlaceholder();
        this.updateStateLabel();

        $(window).on("resize", () => { this.handleResize() });

        $(this.canvas).on("mousedown", (event) => {
            this.dragging = true;
            this.lastX = event.pageX;
            this.lastY = event.pageY;
        });
        $(document).on("mouseup", () => { this.dragging = false });
        $(document).on("mousemove", (event) => { this.handleMouseMove(event.pageX, event.pageY) });

        $("#file-input").on("change", (event) => {
            const input = event.target;
            if (input instanceof HTMLInputElement && input.files && input.files.length > 0) {
                this.openFile(input.files[0]);
            }
        });
        $("#reset-button").on("click", () => {
            this.viewer.loadPlaceholder();
            this.updateStateLabel();
        });

        $(this.canvas).on("dragover", (event) => { event.preventDefault() });
        $(this.canvas).on("drop", (event) => {
            event.preventDefault();
            const original = event.originalEvent;
            if (original instanceof DragEvent && original.dataTransfer && original.dataTransfer.files.length > 0) {
                this.openFile(original.dataTransfer.files[0]);
            }
        });
    }

    run = () => {
        this.viewer.render();
        requestAnimationFrame(this.run);
    }

    openFile(file: File) {
        this.loadFile(file).catch((error) => {
            this.statusLog(`Failed to load ${file.name}: ${describeError(error)}`, 'error');
        });
    }

    async loadFile(file: File): Promise<void> {
        this.statusLog(`📂 Opening ${file.name}`, 'info');
        const bytes = new Uint8Array(await file.arrayBuffer());
        const pending = this.viewer.load(bytes);
        this.updateStateLabel();
        try {
            const report = await pending;
            this.statusLog(`${file.name}: ${report.outcome}, ${report.indexCount / 3} triangles`, 'success');
        } finally {
            this.updateStateLabel();
        }
    }

    handleResize() {
        const width = Math.max(1, Math.floor(this.canvas.clientWidth * window.devicePixelRatio));
        const height = Math.max(1, Math.floor(this.canvas.clientHeight * window.devicePixelRatio));
        this.canvas.width = width;
        this.canvas.height = height;
        this.viewer.resize(width, height);
    }

    handleMouseMove(x: number, y: number) {
        if (!this.dragging) return;
        this.viewer.orbit(x - this.lastX, y - this.lastY);
        this.lastX = x;
        this.lastY = y;
    }

    updateStateLabel() {
        this.stateLabel.text(this.viewer.state);
    }

    statusLog(message: string, level: LogLevel) {
        if (level === 'debug') return;

        $("<div>")
            .addClass(`log-${level}`)
            .text(message)
            .appendTo(this.logContent);

        const entries = this.logContent.children();
        if (entries.length > this.maxLogEntries) {
            entries.first().remove();
        }
        const panel = this.logContent.get(0);
        if (panel) panel.scrollTop = panel.scrollHeight;
    }
}
