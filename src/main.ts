import App from './control/app';

const canvas = document.getElementById('gfx-main');

if (!(canvas instanceof HTMLCanvasElement)) {
    console.error('❌ Missing <canvas id="gfx-main"> element');
} else {
    try {
        const app = new App(canvas);
        app.init();
        app.run();
        console.log('🎯 Viewer ready: drop a .glb or .gltf file on the canvas, drag to orbit');
    } catch (error) {
        console.error('❌ Failed to start viewer:', error);
    }
}
