/**
 * Single-key terminal controls
 *
 *   u  buy UP          d  buy DOWN
 *   k  kill switch     x  exit menu (then 1-9, 0 cancels)
 *   s  status          q  quit (Ctrl-C too)
 */

import readline from "readline";
import type { Direction, Position } from "../core/types";

export interface BotControls {
  enterManual(direction: Direction): void;
  toggleAutoSignals(): void;
  /** Print the exit menu; returns the positions in menu order */
  showExitMenu(): Position[];
  exitPosition(positionId: string): void;
  showStatus(): void;
  quit(): void;
  print(line: string): void;
}

export class KeyCommandRouter {
  private menu: Position[] | null = null;

  constructor(private readonly controls: BotControls) {}

  get inExitMenu(): boolean {
    return this.menu !== null;
  }

  handleKey(key: string): void {
    if (!key) return;

    if (this.menu) {
      this.handleMenuKey(key, this.menu);
      return;
    }

    switch (key) {
      case "u":
        this.controls.enterManual("UP");
        break;
      case "d":
        this.controls.enterManual("DOWN");
        break;
      case "k":
        this.controls.toggleAutoSignals();
        break;
      case "x": {
        const positions = this.controls.showExitMenu();
        this.menu = positions.length > 0 ? positions : null;
        break;
      }
      case "s":
        this.controls.showStatus();
        break;
      case "q":
        this.controls.quit();
        break;
      default:
        break;
    }
  }

  private handleMenuKey(key: string, positions: Position[]): void {
    if (!/^[0-9]$/.test(key)) return;

    const selection = Number(key);
    if (selection === 0) {
      this.menu = null;
      this.controls.print("Cancelled.");
      return;
    }
    if (selection > positions.length) {
      this.controls.print(`Invalid selection: ${selection}`);
      return;
    }

    this.menu = null;
    this.controls.exitPosition(positions[selection - 1].id);
  }
}

/**
 * Put stdin in raw mode and route keypresses. Returns a detach function that
 * restores the terminal.
 */
export function attachKeyboard(
  router: KeyCommandRouter,
  input: NodeJS.ReadStream = process.stdin,
): () => void {
  readline.emitKeypressEvents(input);
  const raw = input.isTTY === true;
  if (raw) input.setRawMode(true);

  const onKeypress = (str: string | undefined, key: readline.Key | undefined): void => {
    if (key?.ctrl && key.name === "c") {
      router.handleKey("q");
      return;
    }
    router.handleKey(str ?? key?.name ?? "");
  };

  input.on("keypress", onKeypress);
  input.resume();

  return () => {
    input.off("keypress", onKeypress);
    if (raw) input.setRawMode(false);
    input.pause();
  };
}
