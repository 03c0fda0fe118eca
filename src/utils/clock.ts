import { Token } from 'typedi';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export const ClockToken = new Token<Clock>('clock');
