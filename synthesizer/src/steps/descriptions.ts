import { ActionKinds, Point } from "@stepwright/shared";

export type ClickAction =
  | typeof ActionKinds.click
  | typeof ActionKinds.rightClick
  | typeof ActionKinds.doubleClick;

const CLICK_VERBS: Record<ClickAction, string> = {
  CLICK: "Click",
  RIGHT_CLICK: "Right-click",
  DOUBLE_CLICK: "Double-click",
};

function isSearchField(elementName: string): boolean {
  const lowered = elementName.toLowerCase();
  return lowered.includes("search") || lowered.includes("address");
}

export function describeClick(
  action: ClickAction,
  elementName: string,
  elementType: string,
  point: Point,
): string {
  const verb = CLICK_VERBS[action];
  if (!elementName) {
    return `${verb} at coordinates (${point.x}, ${point.y})`;
  }

  if (isSearchField(elementName)) {
    return action === ActionKinds.click
      ? `Click on search/address bar: '${elementName}'`
      : `${verb} on '${elementName}'`;
  }

  switch (elementType) {
    case "Button":
      return `${verb} the '${elementName}' button`;
    case "Hyperlink":
      return `${verb} on '${elementName}' link`;
    case "ListItem":
      return `Select '${elementName}' from menu`;
    case "Edit":
    case "ComboBox":
      return `${verb} on '${elementName}' input field`;
    default:
      return `${verb} on '${elementName}'`;
  }
}

export function describeTyping(text: string, elementName: string, groupedFrom: number): string {
  const base = groupedFrom > 1 ? `Type complete text: '${text}'` : `Type '${text}'`;
  return elementName ? `${base} into '${elementName}'` : base;
}

export function clipboardPreview(content: string): string {
  return content.trim().slice(0, 50);
}
