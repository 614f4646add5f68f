import type { Cell, Rect } from './common';
import type { MenuAction, MessageLevel } from './enums';

export type Message = {
  text: string;
  level: MessageLevel;
  t: number;
};

export type I18nVars = Record<string, string | number>;

export type MenuButton = {
  action: MenuAction;
  labelKey: string;
  rect: Rect;
};

export type SessionOptions = {
  rows: number;
  cols: number;
  defaultStart?: Cell;
  defaultTarget?: Cell;
  logSize?: number;
};
