import * as THREE from "three";
import { OrbitControls } from "three/examples/jsm/controls/OrbitControls.js";
import { Coordinator, PhysicsSystem, RigidBodyComponent, Schedule, System, TransformComponent } from "../src/index";

/** ----- Components ----- */
class MeshComponent {
    constructor(public obj: THREE.Mesh<THREE.BoxGeometry, THREE.MeshStandardMaterial>) {}
}

/** Singleton component, found through the "render-context" tag */
class RenderContextComponent {
    constructor(
        public scene: THREE.Scene,
        public camera: THREE.PerspectiveCamera,
        public renderer: THREE.WebGLRenderer,
        public controls: OrbitControls
    ) {}
}

const BOUNDS = 6;

/** ----- Three.js bootstrap ----- */
const scene = new THREE.Scene();
scene.background = new THREE.Color(0x111111);

const camera = new THREE.PerspectiveCamera(70, window.innerWidth / window.innerHeight, 0.1, 100);
camera.position.set(0, 0, 12);

const renderer = new THREE.WebGLRenderer({ antialias: true });
renderer.setSize(window.innerWidth, window.innerHeight);
renderer.setPixelRatio(Math.min(window.devicePixelRatio, 2));
document.body.style.margin = "0";
document.body.appendChild(renderer.domElement);

const controls = new OrbitControls(camera, renderer.domElement);
controls.enableDamping = true;
controls.target.set(0, 0, 0);

// Lights
scene.add(new THREE.AmbientLight(0xffffff, 0.4));
const dir = new THREE.DirectionalLight(0xffffff, 1.0);
dir.position.set(2, 2, 2);
scene.add(dir);

/** ----- Systems ----- */
/** Mirrors each transform onto its mesh, then draws the frame. */
class RenderSystem extends System {
    constructor() {
        super();
        this.requireComponent(TransformComponent);
        this.requireComponent(MeshComponent);
    }

    update(coordinator: Coordinator): void {
        for (const e of this.getSystemEntities()) {
            const tr = coordinator.getComponent(e, TransformComponent);
            const mesh = coordinator.getComponent(e, MeshComponent);
            // physics is screen space (y down), the scene is y up
            mesh.obj.position.set(tr.position.x, -tr.position.y, 0);
            mesh.obj.rotation.z = tr.rotation;
            mesh.obj.scale.set(tr.scale.x, tr.scale.y, 1);
        }

        const ctx = coordinator.getComponent(coordinator.requireEntityByTag("render-context"), RenderContextComponent);
        ctx.controls.update();
        ctx.renderer.render(ctx.scene, ctx.camera);
    }
}

/** Despawns boxes that leave the play area and spawns a fresh one for each. */
class RecycleSystem extends System {
    constructor() {
        super();
        this.requireComponent(TransformComponent);
        this.requireComponent(MeshComponent);
    }

    update(coordinator: Coordinator): void {
        for (const e of this.getSystemEntities()) {
            const { position } = coordinator.getComponent(e, TransformComponent);
            if (Math.abs(position.x) <= BOUNDS && Math.abs(position.y) <= BOUNDS) continue;

            // destruction is staged, so this loop keeps iterating a stable list
            const { obj } = coordinator.getComponent(e, MeshComponent);
            scene.remove(obj);
            obj.geometry.dispose();
            obj.material.dispose();
            coordinator.destroy(e);
            spawnBox(coordinator);
        }
    }
}

/** ----- ECS ----- */
const coordinator = new Coordinator({ debug: false });
const schedule = new Schedule();

coordinator.addSystem(PhysicsSystem, 4);
coordinator.addSystem(RecycleSystem);
coordinator.addSystem(RenderSystem);

const ctxEntity = coordinator.create();
coordinator.addComponent(ctxEntity, RenderContextComponent, scene, camera, renderer, controls);
coordinator.tagEntity(ctxEntity, "render-context");

function spawnBox(c: Coordinator): void {
    const mesh = new THREE.Mesh(
        new THREE.BoxGeometry(0.5, 0.5, 0.5),
        new THREE.MeshStandardMaterial({ color: new THREE.Color().setHSL(Math.random(), 0.6, 0.55) })
    );
    scene.add(mesh);

    const box = c.create();
    c.addComponent(box, TransformComponent, new THREE.Vector2((Math.random() - 0.5) * 4, -BOUNDS + 1));
    c.addComponent(
        box,
        RigidBodyComponent,
        new THREE.Vector2((Math.random() - 0.5) * 3, -4 - Math.random() * 4),
        new THREE.Vector2(0, 0),
        1
    );
    c.addComponent(box, MeshComponent, mesh);
    c.groupEntity(box, "boxes");
}

for (let i = 0; i < 12; i++) spawnBox(coordinator);

/** Schedule phases */
schedule
    .add("simulate", PhysicsSystem)
    .add("simulate", RecycleSystem)
    .add("render", RenderSystem);

/** ----- Game loop ----- */
let last = performance.now();
function frame(now: number) {
    const dt = Math.min((now - last) / 1000, 0.1);
    last = now;

    schedule.run(coordinator, dt, ["simulate", "render"]);
    requestAnimationFrame(frame);
}
requestAnimationFrame(frame);

/** Resize */
window.addEventListener("resize", () => {
    camera.aspect = window.innerWidth / window.innerHeight;
    camera.updateProjectionMatrix();
    renderer.setSize(window.innerWidth, window.innerHeight);
});
