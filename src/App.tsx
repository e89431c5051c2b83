import { useEffect, useSyncExternalStore } from "react";
import { Text, useInput, useStdout } from "ink";

import { palette } from "./theme.js";
import { toKeyEvent, type EventQueue, type TerminalEvent } from "./tui/events.js";
import type { FrameStore } from "./tui/frameStore.js";
import { Screen } from "./tui/Screen.js";

type AppProps = {
  store: FrameStore;
  events: EventQueue<TerminalEvent>;
};

export function App({ store, events }: AppProps) {
  const { stdout } = useStdout();
  const frame = useSyncExternalStore(store.subscribe, store.getSnapshot);

  useInput((input, key) => {
    events.push({ kind: "key", key: toKeyEvent(input, key) });
  });

  useEffect(() => {
    const onResize = () => {
      events.push({ kind: "resize", width: stdout.columns, height: stdout.rows });
    };
    stdout.on("resize", onResize);
    return () => {
      stdout.off("resize", onResize);
    };
  }, [stdout, events]);

  if (!frame) {
    return <Text color={palette.hint}>Loading...</Text>;
  }
  return <Screen frame={frame} />;
}
