import type { ZodIssue } from 'zod'

export class MazeMasterError extends Error {
  constructor(message:string){
    super(message)
    this.name = new.target.name
  }
}

export class ConfigError extends MazeMasterError {
  readonly issues:ZodIssue[]
  constructor(issues:ZodIssue[]){
    super(`invalid config: ${issues.map(i=>`${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')}`)
    this.issues = issues
  }
}

/** Raised when a maze has no open cell near the requested spot. */
export class PlacementError extends MazeMasterError {
  constructor(readonly x:number, readonly y:number){
    super(`no open cell near (${x}, ${y})`)
  }
}
