import { type Action, kind, variant } from '../core/actions/Action';

export interface Add extends Action<'add'> {
  readonly amount: number;
}

export interface Sub extends Action<'sub'> {
  readonly amount: number;
}

export interface Clear extends Action<'clear'> {}

export interface Tick extends Action<'tick'> {
  readonly steps: number;
}

export type CounterAction = Add | Sub | Clear;

export const ADD = kind<Add>('add');
export const SUB = kind<Sub>('sub');
export const CLEAR = kind<Clear>('clear');
export const TICK = kind<Tick>('tick');
export const ARITHMETIC = variant('arithmetic', ADD, SUB);

export const tickToAdd = (action: Tick): Add => ({ type: 'add', amount: action.steps });
