export interface Location {
  line: number;
  column: number;
  offset: number;
}

export interface Span {
  start: Location;
  end: Location;
  sourceFile: string;
}

export function pointSpan(location: Location, sourceFile: string): Span {
  return { start: location, end: location, sourceFile };
}
