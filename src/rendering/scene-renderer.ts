import * as THREE from "three";
import { OrbitControls } from "three/examples/jsm/controls/OrbitControls.js";
import {
  SCENE_BG_COLOR, CURSOR_COLOR, BOUNDS_COLOR, CUBE_FILL,
  CAMERA_MIN_DISTANCE, CAMERA_MAX_DISTANCE, CAMERA_INITIAL_DISTANCE,
} from "../constants";
import { heightToColor, heightFraction } from "../utils/color-utils";
import { gridToWorld } from "../utils/grid-utils";
import { buildCubeMesh } from "./cube-mesh";
import { ALIVE } from "../types/grid-types";
import type { FrameData, Renderer, RendererOptions, RendererMetrics, OrbitCameraState } from "../types/renderer-types";

/** Smallest instance buffer allocated; grows by doubling. */
const MIN_CAPACITY = 1024;

function cubeGeometry(edge: number): THREE.BufferGeometry {
  const mesh = buildCubeMesh(edge);
  const geo = new THREE.BufferGeometry();
  geo.setAttribute("position", new THREE.Float32BufferAttribute(mesh.positions, 3));
  geo.setAttribute("normal", new THREE.Float32BufferAttribute(mesh.normals, 3));
  geo.setIndex(mesh.indices);
  return geo;
}

/**
 * Three.js view of the whole arena: live cells as one instanced cube mesh,
 * the cursor as a separate highlighted cube, and the arena bounds as lines.
 */
export function createSceneRenderer(arenaSize: number, cellSize: number, savedCamera?: OrbitCameraState):
    Renderer {
  const webglRenderer = new THREE.WebGLRenderer({ antialias: true });
  webglRenderer.setPixelRatio(window.devicePixelRatio);

  const scene = new THREE.Scene();
  scene.background = new THREE.Color(SCENE_BG_COLOR);
  scene.add(new THREE.AmbientLight(0xffffff, 0.55));
  const sun = new THREE.DirectionalLight(0xffffff, 0.9);
  sun.position.set(1, 2, 1.5);
  scene.add(sun);

  const arenaWidth = arenaSize * cellSize;
  const camera = new THREE.PerspectiveCamera(45, 1, 0.1, arenaWidth * 20);

  if (savedCamera) {
    const spherical = new THREE.Spherical(savedCamera.distance, savedCamera.polar, savedCamera.azimuth);
    camera.position.setFromSpherical(spherical);
  } else {
    const d = CAMERA_INITIAL_DISTANCE * arenaWidth;
    camera.position.set(d * 0.6, d * 0.45, d * 0.65);
  }
  camera.lookAt(0, 0, 0);

  const controls = new OrbitControls(camera, webglRenderer.domElement);
  controls.enablePan = false;
  controls.enableDamping = true;
  controls.dampingFactor = 0.1;
  controls.minDistance = CAMERA_MIN_DISTANCE * arenaWidth;
  controls.maxDistance = CAMERA_MAX_DISTANCE * arenaWidth;

  // --- Live cells ---
  const cellGeo = cubeGeometry(cellSize * CUBE_FILL);
  const cellMat = new THREE.MeshLambertMaterial({ color: 0xffffff });
  let capacity = 0;
  let cellMesh: THREE.InstancedMesh | null = null;

  function ensureCapacity(count: number): THREE.InstancedMesh {
    if (cellMesh && count <= capacity) return cellMesh;
    let next = Math.max(MIN_CAPACITY, capacity);
    while (next < count) next *= 2;
    if (cellMesh) {
      scene.remove(cellMesh);
      cellMesh.dispose();
    }
    capacity = next;
    cellMesh = new THREE.InstancedMesh(cellGeo, cellMat, capacity);
    cellMesh.frustumCulled = false;
    scene.add(cellMesh);
    return cellMesh;
  }

  // --- Cursor ---
  const cursorGeo = cubeGeometry(cellSize);
  const cursorMat = new THREE.MeshBasicMaterial({ color: CURSOR_COLOR, transparent: true, opacity: 0.35 });
  const cursorMesh = new THREE.Mesh(cursorGeo, cursorMat);
  const cursorEdgesGeo = new THREE.EdgesGeometry(cursorGeo);
  const cursorEdgesMat = new THREE.LineBasicMaterial({ color: CURSOR_COLOR });
  cursorMesh.add(new THREE.LineSegments(cursorEdgesGeo, cursorEdgesMat));
  scene.add(cursorMesh);

  // --- Arena bounds ---
  // Cell centres run from -N/2 to N/2-1, so the box is offset by half a cell.
  const boundsBox = new THREE.BoxGeometry(arenaWidth, arenaWidth, arenaWidth);
  const boundsGeo = new THREE.EdgesGeometry(boundsBox);
  const boundsMat = new THREE.LineBasicMaterial({ color: BOUNDS_COLOR });
  const bounds = new THREE.LineSegments(boundsGeo, boundsMat);
  bounds.position.set(-cellSize / 2, -cellSize / 2, -cellSize / 2);
  scene.add(bounds);

  // Temporary objects reused per-frame
  const _mat4 = new THREE.Matrix4();
  const _color = new THREE.Color();
  const worldMin = gridToWorld(0, arenaSize, cellSize);

  // EMA for scene-update timing
  let sceneUpdateTimeMs = 0;
  const emaAlpha = 0.05;

  // ── update ──────────────────────────────────────────────────────────────

  function update(frame: FrameData, opts: RendererOptions): RendererMetrics {
    const sceneT0 = performance.now();
    const { instances, cursor, grid } = frame;
    const count = instances.count;
    const mesh = ensureCapacity(count);
    const pos = instances.positions;

    for (let i = 0; i < count; i++) {
      const o = i * 3;
      _mat4.makeTranslation(pos[o], pos[o + 1], pos[o + 2]);
      mesh.setMatrixAt(i, _mat4);
      const row = Math.round((pos[o + 1] - worldMin) / cellSize);
      _color.setHex(heightToColor(heightFraction(row, arenaSize)));
      mesh.setColorAt(i, _color);
    }
    mesh.count = count;
    mesh.instanceMatrix.needsUpdate = true;
    if (mesh.instanceColor) mesh.instanceColor.needsUpdate = true;

    cursorMesh.position.set(
      gridToWorld(cursor.x, arenaSize, cellSize),
      gridToWorld(cursor.y, arenaSize, cellSize),
      gridToWorld(cursor.z, arenaSize, cellSize),
    );
    const cursorAlive = grid.get(cursor.x, cursor.y, cursor.z) === ALIVE;
    cursorMat.opacity = cursorAlive ? 0.9 : 0.35;

    bounds.visible = opts.showBounds;

    controls.update();
    webglRenderer.render(scene, camera);

    const rawSceneMs = performance.now() - sceneT0;
    sceneUpdateTimeMs = emaAlpha * rawSceneMs + (1 - emaAlpha) * sceneUpdateTimeMs;

    return {
      fps: 0,
      sceneUpdateTimeMs,
      stepTimeMs: opts.stepTimeMs,
      drawnCells: count + (cursorAlive ? 1 : 0),
    };
  }

  // ── resize ──────────────────────────────────────────────────────────────

  function resize(width: number, height: number): void {
    camera.aspect = width / height;
    camera.updateProjectionMatrix();
    webglRenderer.setSize(width, height);
  }

  // ── getCameraState ──────────────────────────────────────────────────────

  function getCameraState(): OrbitCameraState {
    const spherical = new THREE.Spherical().setFromVector3(camera.position);
    return {
      azimuth: spherical.theta,
      polar: spherical.phi,
      distance: spherical.radius,
    };
  }

  // ── destroy ─────────────────────────────────────────────────────────────

  function destroy(): void {
    controls.dispose();
    cellMesh?.dispose();
    cellGeo.dispose();
    cellMat.dispose();
    cursorGeo.dispose();
    cursorMat.dispose();
    cursorEdgesGeo.dispose();
    cursorEdgesMat.dispose();
    boundsBox.dispose();
    boundsGeo.dispose();
    boundsMat.dispose();
    webglRenderer.dispose();
  }

  return {
    canvas: webglRenderer.domElement,
    update,
    resize,
    destroy,
    savesCameraState: () => true,
    getCameraState,
  };
}
