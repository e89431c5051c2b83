import { Box, Text } from "ink";

import type { FrameSnapshot, PaneSnapshot, StatusLine } from "../app/controller.js";
import type { HighlightedLine } from "../highlight/builder.js";
import { palette } from "../theme.js";
import type { PlacedWidget, Rect, Widget } from "./surface.js";

type BlockWidget = Extract<Widget, { kind: "block" }>;

const BORDER_CHARS = {
  thick: { left: "┏", fill: "━", right: "┓", ink: "bold" },
  plain: { left: "┌", fill: "─", right: "┐", ink: "single" },
} as const;

function trimTo(text: string, width: number): string {
  if (text.length <= width) {
    return text;
  }
  return `${text.slice(0, Math.max(0, width - 3))}...`;
}

// Ink has no border titles, so the top edge is drawn as text.
function topBorder(block: BlockWidget, width: number): string {
  if (width < 2) {
    return "";
  }
  const chars = BORDER_CHARS[block.borderType];
  const title = trimTo(block.title, Math.max(0, width - 2));
  return `${chars.left}${title}${chars.fill.repeat(Math.max(0, width - 2 - title.length))}${chars.right}`;
}

function LineView({ line, prefix }: { line: HighlightedLine; prefix?: string }) {
  return (
    <Text wrap="truncate">
      {prefix ?? ""}
      {line.map((fragment, idx) => (
        <Text
          key={`fragment-${idx}`}
          color={fragment.style.fg}
          dimColor={fragment.style.dim}
          bold={fragment.style.bold}
          underline={fragment.style.underline}
        >
          {fragment.text}
        </Text>
      ))}
    </Text>
  );
}

function WidgetView({ widget }: { widget: Widget }) {
  switch (widget.kind) {
    case "tabs":
      return (
        <Text wrap="truncate">
          {widget.titles.map((title, idx) => (
            <Text key={`tab-${title.text}`}>
              {idx > 0 ? <Text color="gray">{"·"}</Text> : null}
              {" "}
              {idx === widget.selected ? (
                <Text color="white" bold underline>
                  {title.text}
                </Text>
              ) : (
                <Text color={title.style.fg} dimColor>
                  {title.text}
                </Text>
              )}
              {" "}
            </Text>
          ))}
        </Text>
      );
    case "list":
      return (
        <>
          {widget.items.map((line, idx) => (
            <LineView
              key={`row-${idx}`}
              line={line}
              prefix={idx === widget.selected ? widget.highlightSymbol : " ".repeat(widget.highlightSymbol.length)}
            />
          ))}
        </>
      );
    case "paragraph":
      return (
        <>
          {widget.lines.map((line, idx) => (
            <LineView key={`line-${idx}`} line={line} />
          ))}
        </>
      );
    case "block":
      return null;
  }
}

function PaneView({ pane }: { pane: PaneSnapshot }) {
  const { area } = pane;
  const placedBlock = pane.widgets.find((placed): placed is PlacedWidget & { widget: BlockWidget } => placed.widget.kind === "block");
  if (!placedBlock || area.width < 2 || area.height < 2) {
    return <Box width={area.width} height={area.height} />;
  }
  const block = placedBlock.widget;
  const color = block.borderStyle.fg ?? palette.border;
  const children = pane.widgets.filter((placed) => placed !== placedBlock).sort((a, b) => a.area.y - b.area.y);

  const origin: Rect = { x: area.x + 1, y: area.y + 1, width: area.width - 2, height: area.height - 2 };
  let cursorY = origin.y;

  return (
    <Box flexDirection="column" width={area.width} height={area.height}>
      <Text color={color} bold={block.borderStyle.bold}>
        {topBorder(block, area.width)}
      </Text>
      <Box
        flexDirection="column"
        width={area.width}
        height={area.height - 1}
        borderStyle={BORDER_CHARS[block.borderType].ink}
        borderTop={false}
        borderColor={color}
      >
        {children.map((placed, idx) => {
          const marginTop = Math.max(0, placed.area.y - cursorY);
          cursorY = placed.area.y + placed.area.height;
          return (
            <Box
              key={`${pane.id}-widget-${idx}`}
              flexDirection="column"
              marginTop={marginTop}
              marginLeft={Math.max(0, placed.area.x - origin.x)}
              width={placed.area.width}
              height={placed.area.height}
              overflow="hidden"
            >
              <WidgetView widget={placed.widget} />
            </Box>
          );
        })}
      </Box>
    </Box>
  );
}

function StatusView({ status }: { status: StatusLine }) {
  const operation = status.operation ?? "no operation selected";
  return (
    <Box width={status.area.width} height={status.area.height}>
      <Text wrap="truncate">
        <Text color={palette.section}>{` ${status.document} `}</Text>
        <Text color={palette.border}>{"│"}</Text>
        <Text color={status.operation ? palette.ok : palette.warn}>{` ${operation} `}</Text>
        <Text color={palette.border}>{"│"}</Text>
        <Text color={palette.hint}>{` ${status.hint}`}</Text>
      </Text>
    </Box>
  );
}

export function Screen({ frame }: { frame: FrameSnapshot }) {
  const columns = new Map<number, PaneSnapshot[]>();
  for (const pane of frame.panes) {
    const column = columns.get(pane.area.x) ?? [];
    column.push(pane);
    columns.set(pane.area.x, column);
  }
  const ordered = [...columns.entries()].sort(([a], [b]) => a - b);

  return (
    <Box flexDirection="column" width={frame.width} height={frame.height}>
      <Box flexDirection="row">
        {ordered.map(([x, panes]) => (
          <Box key={`column-${x}`} flexDirection="column">
            {[...panes]
              .sort((a, b) => a.area.y - b.area.y)
              .map((pane) => (
                <PaneView key={pane.id} pane={pane} />
              ))}
          </Box>
        ))}
      </Box>
      <StatusView status={frame.status} />
    </Box>
  );
}
