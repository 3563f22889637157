import type {Id} from "./brand.js";
import {StaticTypeCompanion} from "./companion.js";

export type ISODateString = Id<'iso-date'>

export const ISODateString = StaticTypeCompanion({
  now(): ISODateString {
    return new Date().toISOString()
  },
  /** Whole seconds elapsed between two timestamps */
  secondsBetween(from: ISODateString, to: ISODateString): number {
    return Math.max(0, Math.round((Date.parse(to) - Date.parse(from)) / 1000))
  },
})
