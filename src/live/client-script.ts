import { LIVE_RELOAD_ENDPOINT } from "./messages";

/** Query parameter marking a framed navigation as a history replay */
export const HISTORY_REPLAY_PARAM = "history";

/** Message posted to a containing frame after each load */
export const NAVIGATE_MESSAGE_TYPE = "pagewright:navigate";

export type ClientState = "idle" | "building" | "error" | "reloaded";

/**
 * Browser side of the reload protocol, served at `/__livereload.js`.
 * States visited are recorded on `window.__pagewright.transitions`.
 */
export const LIVE_RELOAD_CLIENT = `(function () {
  "use strict";
  var live = { state: "idle", transitions: ["idle"] };
  window.__pagewright = live;

  function enter(next) {
    if (live.state === next) return;
    live.state = next;
    live.transitions.push(next);
  }

  var notice = null;
  function show(message, error) {
    if (!document.body) return;
    if (!notice) {
      notice = document.createElement("div");
      notice.id = "__pagewright-notice";
      notice.setAttribute(
        "style",
        "position:fixed;right:1rem;bottom:1rem;z-index:2147483647;padding:.5rem .75rem;" +
          "border-radius:4px;font:13px/1.4 system-ui,sans-serif;color:#fff;white-space:pre-wrap"
      );
      document.body.appendChild(notice);
    }
    notice.textContent = message;
    notice.style.background = error ? "#b91c1c" : "#1f2937";
  }
  function hide() {
    if (notice && notice.parentNode) notice.parentNode.removeChild(notice);
    notice = null;
  }

  var scheme = location.protocol === "https:" ? "wss://" : "ws://";
  var socket = new WebSocket(scheme + location.host + "${LIVE_RELOAD_ENDPOINT}");

  socket.onmessage = function (frame) {
    if (live.state === "reloaded") return;
    var event;
    try {
      event = JSON.parse(frame.data);
    } catch (err) {
      return;
    }
    if (!event || typeof event.type !== "string") return;

    if (event.type === "start") {
      enter("building");
      show("Building...", false);
    } else if (event.type === "notify") {
      if (event.error) {
        enter("error");
        show(String(event.message), true);
      } else {
        enter("idle");
        show(String(event.message), false);
      }
    } else if (event.type === "reload") {
      enter("reloaded");
      hide();
      socket.close();
      if (typeof event.href === "string" && event.href.length > 0) {
        location.assign(event.href);
      } else {
        location.reload();
      }
    }
  };

  window.addEventListener("beforeunload", function () {
    socket.close();
  });

  if (window.parent && window.parent !== window) {
    var replay = new RegExp("[?&]${HISTORY_REPLAY_PARAM}=1(&|$)").test(location.search);
    if (!replay) {
      window.parent.postMessage({ type: "${NAVIGATE_MESSAGE_TYPE}", href: location.href }, "*");
    }
  }
})();
`;
