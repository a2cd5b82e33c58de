// src/App.tsx
import React, { useState } from "react";
import Game from "./Game";
import type { Progress } from "./Game";
import type { GameConfig } from "./config";
import type { Rng } from "./rng";
import type { Lang } from "./types";
import { STRINGS } from "./strings";
import "./index.css";

type Props = { cfg: GameConfig; rng?: Rng };

const App: React.FC<Props> = ({ cfg, rng }) => {
  const [lang, setLang] = useState<Lang>(cfg.lang);
  const t = STRINGS[lang];

  // progress coming from Game
  const [progress, setProgress] = useState<Progress | null>(null);

  return (
    <div dir={lang === "he" ? "rtl" : "ltr"} className="app">
      <header className="header">
        <h1 className="logo">{t.title}</h1>
        {progress && (
          <div className="stats" aria-label="stats">
            <span>{`${t.level}: ${progress.level}`}</span>
            <span>{`${t.score}: ${progress.score}`}</span>
            <span>{t.best(progress.best)}</span>
          </div>
        )}
      </header>

      <main className="stage">
        <Game cfg={cfg} lang={lang} rng={rng} onProgress={setProgress} />
      </main>

      <nav className="langbar" aria-label="language">
        <div className="langchips">
          <button
            onClick={() => setLang("en")}
            className={`chip ${lang === "en" ? "active" : ""}`}
          >
            {t.en}
          </button>
          <button
            onClick={() => setLang("he")}
            className={`chip ${lang === "he" ? "active" : ""}`}
          >
            {t.he}
          </button>
        </div>
      </nav>
    </div>
  );
};

export default App;
