/**
 * @uniform-tilings/viewer - browser entry
 *
 * Renders the tiling named in the query string and offers it as an OBJ
 * download. See `config.ts` for the accepted parameters.
 */

import * as THREE from 'three';
import { OrbitControls } from 'three/examples/jsm/controls/OrbitControls.js';
import {
  TILING_KINDS,
  countFacesBySides,
  generateTiling,
  getTilingDefinition,
  type TilingMesh,
} from '@uniform-tilings/core';
import {
  DEFAULT_VIEWER_CONFIG,
  InvalidViewerConfigError,
  formatViewerConfig,
  parseViewerConfig,
  type ViewerConfig,
} from './config.js';
import { createTilingObject, disposeTilingObject } from './TilingAdapter.js';
import { createObjDownload } from './download.js';

// ============================================================================
// Configuration
// ============================================================================

function loadConfig(): { config: ViewerConfig; warning?: string } {
  try {
    return { config: parseViewerConfig(window.location.search) };
  } catch (error) {
    if (!(error instanceof InvalidViewerConfigError)) throw error;
    console.error('[viewer] Invalid query string, using defaults:', error.errors);
    const fields = Object.keys(error.errors).join(', ');
    return { config: { ...DEFAULT_VIEWER_CONFIG }, warning: `Ignored invalid ${fields}` };
  }
}

const { config, warning } = loadConfig();
console.debug('[viewer] Config:', config);

// ============================================================================
// Scene Setup
// ============================================================================

const container = document.getElementById('app');
if (!container) {
  throw new Error('Missing #app container');
}

const scene = new THREE.Scene();
scene.background = new THREE.Color(0x1a1a2e);

const camera = new THREE.PerspectiveCamera(50, window.innerWidth / window.innerHeight, 0.1, 5000);

const renderer = new THREE.WebGLRenderer({ antialias: true });
renderer.setSize(window.innerWidth, window.innerHeight);
renderer.setPixelRatio(Math.min(window.devicePixelRatio, 2));
container.appendChild(renderer.domElement);

const controls = new OrbitControls(camera, renderer.domElement);
controls.enableDamping = true;
controls.dampingFactor = 0.05;

scene.add(new THREE.AmbientLight(0xffffff, 0.6));
const mainLight = new THREE.DirectionalLight(0xffffff, 0.8);
mainLight.position.set(5, -10, 20);
scene.add(mainLight);

// ============================================================================
// Tiling
// ============================================================================

function buildTiling(): TilingMesh {
  const start = performance.now();
  const mesh = generateTiling(config.tiling, config.rows, config.cols);
  const elapsed = performance.now() - start;
  console.debug(
    `[viewer] Generated ${mesh.name} ${config.rows}x${config.cols}: ` +
      `${mesh.points.length} points, ${mesh.faces.length} faces in ${elapsed.toFixed(2)}ms`
  );
  return mesh;
}

function frame(object: THREE.Object3D): void {
  const box = new THREE.Box3().setFromObject(object);
  const center = box.getCenter(new THREE.Vector3());
  const size = box.getSize(new THREE.Vector3());
  const distance = Math.max(size.x, size.y, 1) * 1.2;

  camera.position.set(center.x, center.y, distance);
  controls.target.copy(center);
  controls.maxDistance = distance * 4;
  controls.update();
}

const mesh = buildTiling();
const tiling = createTilingObject(mesh);
scene.add(tiling);
frame(tiling);

// ============================================================================
// UI Overlay
// ============================================================================

const download = createObjDownload(mesh, `${config.tiling}.obj`, {
  reverseWinding: config.reverseWinding,
});

function objDownloadLink(): HTMLAnchorElement {
  const link = document.createElement('a');
  link.href = download.url;
  link.download = download.filename;
  link.textContent = `Download ${link.download}`;
  link.style.color = '#4a90e2';
  return link;
}

function tilingSelect(): HTMLSelectElement {
  const select = document.createElement('select');
  for (const kind of TILING_KINDS) {
    const option = document.createElement('option');
    option.value = kind;
    option.textContent = `${kind} (${getTilingDefinition(kind).vertexConfiguration})`;
    option.selected = kind === config.tiling;
    select.appendChild(option);
  }
  select.addEventListener('change', () => {
    const kind = TILING_KINDS.find((k) => k === select.value);
    if (kind) {
      window.location.search = formatViewerConfig({ ...config, tiling: kind });
    }
  });
  return select;
}

const infoDiv = document.createElement('div');
infoDiv.style.cssText = `
  position: fixed;
  top: 20px;
  left: 20px;
  padding: 16px 20px;
  background: rgba(0, 0, 0, 0.7);
  color: #fff;
  font-family: 'SF Mono', 'Fira Code', monospace;
  font-size: 13px;
  border-radius: 8px;
  line-height: 1.6;
`;

const title = document.createElement('div');
title.style.cssText = 'font-size: 16px; font-weight: 600; margin-bottom: 8px; color: #4a90e2;';
title.textContent = mesh.name;
infoDiv.appendChild(title);
infoDiv.appendChild(tilingSelect());

const stats = document.createElement('div');
const faceMix = [...countFacesBySides(mesh)].map(([sides, count]) => `${count}×${sides}-gon`).join(', ');
stats.textContent = `${mesh.points.length} points · ${faceMix || 'no faces'}`;
infoDiv.appendChild(stats);

if (warning) {
  const warningDiv = document.createElement('div');
  warningDiv.style.color = '#f90';
  warningDiv.textContent = warning;
  infoDiv.appendChild(warningDiv);
}

infoDiv.appendChild(objDownloadLink());
document.body.appendChild(infoDiv);

// ============================================================================
// Window Event Handlers
// ============================================================================

window.addEventListener('pagehide', () => {
  console.debug('[viewer] Releasing OBJ download and tiling geometry');
  download.revoke();
  disposeTilingObject(tiling);
  renderer.dispose();
});

window.addEventListener('resize', () => {
  camera.aspect = window.innerWidth / window.innerHeight;
  camera.updateProjectionMatrix();
  renderer.setSize(window.innerWidth, window.innerHeight);
});

// ============================================================================
// Animation Loop
// ============================================================================

function animate() {
  requestAnimationFrame(animate);
  controls.update();
  renderer.render(scene, camera);
}

animate();
