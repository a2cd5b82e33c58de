/* Game.tsx — desktop: arrows move, WASD aim, space fire; phone: left stick moves, right stick aims+fires */
import { useCallback, useEffect, useRef, useState } from "react";
import type { ReactElement } from "react";
import type { FrameInput, GameEvent, Lang, Phase } from "./types";
import type { GameConfig } from "./config";
import type { Rng } from "./rng";
import type { World } from "./engine";
import { createRng } from "./rng";
import { createWorld, pressKey, step } from "./engine";
import { drawWorld, layout } from "./render";
import { STRINGS } from "./strings";
import { useInput } from "./useInput";
import type { KeyAction } from "./useInput";
import { useThumbstick } from "./useThumbstick";
import { useAimstick } from "./useAimstick";
import { synth } from "./audio";
import { getLogger } from "./logger";

const log = getLogger("game");

const nowMs = () => (typeof performance !== "undefined" ? performance.now() : Date.now());
/** longest stretch the loop will catch up on after a stall (tab switch etc.) */
const MAX_CATCHUP_MS = 250;

/* ===== input mode detection ===== */
function detectMode(): "touch" | "desktop" {
  if (typeof window === "undefined") return "desktop";
  const coarse = window.matchMedia("(pointer: coarse)").matches;
  const hasTouch = navigator.maxTouchPoints > 0;
  const phoneSized = Math.min(window.innerWidth, window.innerHeight) <= 500;
  return (coarse || hasTouch) && phoneSized ? "touch" : "desktop";
}

export type Progress = { phase: Phase; level: number; score: number; best: number; paused: boolean };

const snapshot = (w: World): Progress =>
  ({ phase: w.phase, level: w.level, score: w.score, best: w.best, paused: w.paused });

function playSound(e: GameEvent) {
  switch (e.type) {
    case "moved": synth.step(); break;
    case "fired": synth.fire(); break;
    case "adversaryDestroyed": synth.hit(); break;
    case "caught": synth.caught(); break;
    case "levelComplete": synth.exit(); break;
    case "started": synth.start(); break;
    default: break;
  }
}

type Props = {
  cfg: GameConfig;
  lang: Lang;
  /** injected in tests; defaults to a generator seeded from `cfg.seed` */
  rng?: Rng;
  onProgress?: (p: Progress) => void;
};

export default function Game({ cfg, lang, rng: rngProp, onProgress }: Props): ReactElement {
  const [rng] = useState(() => rngProp ?? createRng(cfg.seed));
  const [world] = useState(() => createWorld(cfg, rng));
  const [view, setView] = useState<Progress>(() => snapshot(world));
  const [muted, setMuted] = useState(synth.muted);

  const canvasRef = useRef<HTMLCanvasElement | null>(null);
  const rafRef = useRef<number | null>(null);
  const MODE = useRef<"touch" | "desktop">(detectMode());
  const t = STRINGS[lang];

  const progressRef = useRef(onProgress);
  progressRef.current = onProgress;

  /* --- events -> sound + react state --- */
  const handle = useCallback((events: GameEvent[]) => {
    if (!events.length) return;
    for (const e of events) playSound(e);
    const next = snapshot(world);
    setView(next);
    progressRef.current?.(next);
    for (const e of events) if (e.type === "started") log.info("level started", { level: e.level, score: world.score });
  }, [world]);

  const act = useCallback((action: KeyAction) => {
    void synth.resume();
    if (action === "mute") {
      synth.mute(!synth.muted);
      setMuted(synth.muted);
      return;
    }
    handle(pressKey(world, action, rng));
  }, [handle, world, rng]);

  // desktop inputs
  const { read: readKeys } = useInput(act);
  // touch inputs
  const touch = MODE.current === "touch";
  const { dirRef: moveRef } = useThumbstick(canvasRef, touch);
  const { dirRef: aimRef, firingRef } = useAimstick(canvasRef, touch);

  const readInput = useCallback((): FrameInput => {
    const k = readKeys();
    if (!touch) return k;
    return {
      move: moveRef.current ?? k.move,
      aim: aimRef.current ?? k.aim,
      fire: firingRef.current || k.fire,
    };
  }, [readKeys, touch, moveRef, aimRef, firingRef]);

  /* ===== sizing ===== */
  useEffect(() => {
    const c = canvasRef.current;
    if (!c) return;
    const L = layout(cfg);
    const dpr = window.devicePixelRatio || 1;
    c.width = Math.floor(L.width * dpr);
    c.height = Math.floor(L.height * dpr);
    c.style.aspectRatio = `${L.width} / ${L.height}`;
    c.getContext("2d")?.setTransform(dpr, 0, 0, dpr, 0, 0);
  }, [cfg]);

  /* ===== loop ===== */
  useEffect(() => {
    const c = canvasRef.current;
    const ctx = c ? c.getContext("2d") : null;
    const stepMs = 1000 / cfg.fps;
    let acc = 0;
    let last = nowMs();

    const loop = () => {
      rafRef.current = requestAnimationFrame(loop);
      const tNow = nowMs();
      acc += Math.min(MAX_CATCHUP_MS, tNow - last);
      last = tNow;
      while (acc >= stepMs) {
        acc -= stepMs;
        handle(step(world, readInput(), rng));
      }
      if (ctx) drawWorld(ctx, world, t);
    };

    rafRef.current = requestAnimationFrame(loop);
    return () => { if (rafRef.current !== null) cancelAnimationFrame(rafRef.current); };
  }, [cfg, world, rng, t, handle, readInput]);

  /* ===== overlays ===== */
  let overlay: ReactElement | null = null;
  if (view.phase === "menu") {
    overlay = (
      <div className="overlay menu" onPointerDown={() => act("fire")}>
        <h2 className="title">{t.title}</h2>
        <p className="hint">{t.start}</p>
        <ul className="instructions">
          {t.instructions.map((line) => <li key={line}>{line}</li>)}
          {touch && <li>{t.touch}</li>}
        </ul>
        {view.best > 0 && <p className="best">{t.best(view.best)}</p>}
      </div>
    );
  } else if (view.phase === "gameOver") {
    overlay = (
      <div className="overlay dim" onPointerDown={() => act("restart")}>
        <h2 className="title lost">{t.gameOver}</h2>
        <p className="score">{t.finalScore(view.score)}</p>
        <p className="hint">{t.restartHint}</p>
      </div>
    );
  } else if (view.phase === "levelComplete") {
    overlay = (
      <div className="overlay dim" onPointerDown={() => act("fire")}>
        <h2 className="title won">{t.levelComplete}</h2>
        <p className="score">{`${t.score}: ${view.score}`}</p>
        <p className="hint">{t.nextHint}</p>
      </div>
    );
  } else if (view.paused) {
    overlay = (
      <div className="overlay dim" onPointerDown={() => act("pause")}>
        <h2 className="title">{t.paused}</h2>
        <p className="hint">{t.resumeHint}</p>
      </div>
    );
  }

  return (
    <div className="game" dir={lang === "he" ? "rtl" : "ltr"} data-phase={view.phase}>
      <canvas className="canvas" ref={canvasRef} aria-label={t.title} />
      {overlay}
      {muted && <span className="muted" aria-label="muted">🔇</span>}
    </div>
  );
}
