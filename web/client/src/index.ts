import { createElement } from "react";
import { createRoot } from "react-dom/client";
import App from "./App";
import { createHttpFolderScanner } from "./api";
import { viewerOptionsFromEnv } from "./config";
import { createBrowserDecoder } from "./document/BrowserDecoder";
import { Logger } from "./logger";
import { LocalStorageSettingsStore } from "./settings/SettingsStore";
import { ViewerSession } from "./viewer/ViewerSession";
import "./index.css";

const options = viewerOptionsFromEnv(import.meta.env);
Logger.setLevel(options.logLevel);

const container = document.getElementById("root");
if (!container) {
  throw new Error("Missing root element");
}

const session = new ViewerSession({
  decoder: createBrowserDecoder(options.apiBase),
  scanner: createHttpFolderScanner(options.apiBase),
  settingsStore: new LocalStorageSettingsStore(window.localStorage),
  options,
});

const initialDirectory = new URLSearchParams(window.location.search).get("dir");

const root = createRoot(container);
root.render(createElement(App, { session, initialDirectory }));
