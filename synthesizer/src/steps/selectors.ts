import {
  DragSpan,
  Point,
  PointSelector,
  TextSelector,
  CoordinatesSelector,
} from "@stepwright/shared";

export function pointSelector(point: Point): PointSelector {
  return { type: "coordinates", value: { x: point.x, y: point.y } };
}

export function dragSelector(span: DragSpan): CoordinatesSelector {
  return {
    type: "coordinates",
    value: {
      start_x: span.start_x,
      start_y: span.start_y,
      end_x: span.end_x,
      end_y: span.end_y,
    },
  };
}

export function textSelector(elementName: string, point: Point | null): TextSelector {
  if (!point) {
    return { type: "text", value: elementName };
  }
  return { type: "text", value: elementName, fallback: pointSelector(point) };
}

/** Text selector with a coordinate fallback, or coordinates alone when the element is unnamed. */
export function targetSelector(
  elementName: string,
  point: Point,
): TextSelector | PointSelector {
  if (elementName) {
    return textSelector(elementName, point);
  }
  return pointSelector(point);
}
