/** The slice of `CanvasRenderingContext2D` the game draws with. */
export interface DrawingContext {
  fillStyle: string | CanvasGradient | CanvasPattern;
  font: string;
  clearRect(x: number, y: number, width: number, height: number): void;
  fillRect(x: number, y: number, width: number, height: number): void;
  fillText(text: string, x: number, y: number): void;
  beginPath(): void;
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  stroke(): void;
}
