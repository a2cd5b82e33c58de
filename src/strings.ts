import type { Lang } from './types'

export type Strings = {
  title:string
  start:string
  instructions:readonly string[]
  touch:string
  gameOver:string
  finalScore:(n:number)=>string
  restartHint:string
  levelComplete:string
  nextHint:string
  paused:string
  resumeHint:string
  best:(n:number)=>string
  level:string
  score:string
  enemies:string
  gun:string
  ready:string
  reloading:string
  he:string
  en:string
}

const en:Strings = {
  title:'MAZEMASTER',
  start:'Press SPACE to Start',
  instructions:[
    'Arrow Keys: Hold to move continuously',
    'WASD Keys: Rotate gun (W=up, S=down, A=left, D=right)',
    'SPACE: Shoot laser',
    'Escape mazes, avoid orange enemies!',
    'Shoot enemies to clear your path!',
  ],
  touch:'Touch: drag left half to move • drag right half to aim and fire',
  gameOver:'GAME OVER',
  finalScore:n=>`Final Score: ${n}`,
  restartHint:'Press R to Restart or ESC to Menu',
  levelComplete:'LEVEL COMPLETE!',
  nextHint:'Press SPACE for Next Level',
  paused:'PAUSED',
  resumeHint:'P to resume • M to mute',
  best:n=>`Best: ${n}`,
  level:'Level',
  score:'Score',
  enemies:'Enemies',
  gun:'Gun',
  ready:'Ready',
  reloading:'Reloading',
  he:'עברית',
  en:'English',
}

const he:Strings = {
  title:'מבוך',
  start:'לחצו רווח כדי להתחיל',
  instructions:[
    'חצים: החזיקו כדי לזוז',
    'WASD: סיבוב הרובה (W=למעלה, S=למטה, A=שמאלה, D=ימינה)',
    'רווח: ירי לייזר',
    'צאו מהמבוך והתחמקו מהאויבים הכתומים!',
    'ירו באויבים כדי לפנות את הדרך!',
  ],
  touch:'מגע: גררו בצד שמאל כדי לזוז • גררו בצד ימין כדי לכוון ולירות',
  gameOver:'המשחק נגמר',
  finalScore:n=>`ניקוד סופי: ${n}`,
  restartHint:'R להתחלה מחדש • ESC לתפריט',
  levelComplete:'השלב הושלם!',
  nextHint:'רווח לשלב הבא',
  paused:'מושהה',
  resumeHint:'P להמשך • M להשתקה',
  best:n=>`שיא: ${n}`,
  level:'שלב',
  score:'ניקוד',
  enemies:'אויבים',
  gun:'רובה',
  ready:'מוכן',
  reloading:'טוען',
  he:'עברית',
  en:'English',
}

export const STRINGS:Readonly<Record<Lang,Strings>> = { en, he }
