export { linkProgram, type Item, type Linked, type LinkProgramOptions } from "./linker";
