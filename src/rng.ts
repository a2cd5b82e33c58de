import seedrandom from 'seedrandom'

export type Rng = {
  /** uniform in [0, 1) */
  next():number
  /** integer in [min, max], both inclusive */
  int(min:number,max:number):number
  pick<T>(items:readonly T[]):T
}

export function fromSource(source:()=>number):Rng{
  const next=()=>source()
  const int=(min:number,max:number)=>min+Math.floor(next()*(max-min+1))
  return {
    next,
    int,
    pick:(items)=>{
      if(!items.length) throw new RangeError('pick from empty list')
      return items[int(0,items.length-1)]
    },
  }
}

/** Seeded generator; without a seed it is auto-seeded from entropy. */
export function createRng(seed?:string):Rng{
  const prng = seed===undefined ? seedrandom() : seedrandom(seed)
  return fromSource(()=>prng())
}
