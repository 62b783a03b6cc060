import { BrowserGame, CANVAS_HEIGHT, CANVAS_WIDTH } from "./BrowserGame.js";
import { createBrowserLogger } from "./logger.js";
import { readLaunchParams, withParam } from "./params.js";

const params = readLaunchParams(window.location);
const logger = createBrowserLogger("Battleship", params.debug);

const canvas = document.querySelector<HTMLCanvasElement>("#battlefield");
const context = canvas?.getContext("2d");
if (!canvas || !context) {
  throw new Error("Canvas #battlefield is not available");
}
canvas.width = CANVAS_WIDTH;
canvas.height = CANVAS_HEIGHT;

logger.info("Connecting", { server: params.server });
const socket = new WebSocket(params.server);

const game = new BrowserGame({
  context,
  send: (text) => socket.send(text),
  name: params.name,
  gameId: params.gameId,
  playerId: params.playerId,
  onGameCreated: (gameId) => {
    window.history.replaceState(null, "", withParam(window.location.href, "game", String(gameId)));
  },
  onJoined: (playerId) => {
    window.history.replaceState(null, "", withParam(window.location.href, "player", playerId));
  },
  logger,
});
game.render();

socket.addEventListener("open", () => game.open());
socket.addEventListener("message", (event: MessageEvent<string | Blob>) => {
  void game.receive(event.data);
});
socket.addEventListener("close", () => {
  logger.info("Disconnected");
  game.disconnected();
});
socket.addEventListener("error", () => logger.warn("WebSocket error"));

canvas.addEventListener("click", (event) => {
  const bounds = canvas.getBoundingClientRect();
  game.click(event.clientX - bounds.left, event.clientY - bounds.top);
});
canvas.addEventListener("mousemove", (event) => {
  const bounds = canvas.getBoundingClientRect();
  game.hover(event.clientX - bounds.left, event.clientY - bounds.top);
});
window.addEventListener("keydown", (event) => game.press(event.key));
