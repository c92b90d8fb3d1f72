import { defineOption } from "./command.ts"

export const optProject = defineOption({
  name: "project",
  type: "string",
  long: "--project",
  valueHint: "<dir>",
  description: "Android project root used to find the default log file and app id"
} as const)

export const optNoPackage = defineOption({
  name: "noPackage",
  type: "boolean",
  long: "--no-package",
  description: "Start with the package filter disabled"
} as const)

export const optPackage = defineOption({
  name: "package",
  type: "string",
  long: "--package",
  valueHint: "<app-id>",
  description: "Package name for the package filter (overrides the discovered app id)"
} as const)

export const optTag = defineOption({
  name: "tag",
  type: "string",
  long: "--tag",
  short: "-t",
  valueHint: "<tag>",
  description: 'Tag filter (substring; wrap in double quotes for an exact match)'
} as const)

export const optLevel = defineOption({
  name: "level",
  type: "string",
  long: "--level",
  short: "-l",
  valueHint: "<E|W+|VDI>",
  description: "Level filter: a letter set (E, VDI) or a minimum (W+)"
} as const)

export const optText = defineOption({
  name: "text",
  type: "string",
  long: "--text",
  valueHint: "<text>",
  description: "Message text filter (substring; wrap in double quotes for an exact match)"
} as const)

export const optNoReplay = defineOption({
  name: "noReplay",
  type: "boolean",
  long: "--no-replay",
  description: "Only show lines written after startup (skip the existing file content)"
} as const)

export const optFollow = defineOption({
  name: "follow",
  type: "boolean",
  long: "--follow",
  short: "-f",
  description: "Keep printing new lines as they are written"
} as const)

export const optProducerPid = defineOption({
  name: "producerPid",
  type: "number",
  long: "--producer-pid",
  valueHint: "<pid>",
  description: "Pid of the process writing the log; the view freezes when it exits"
} as const)

export const filterOptions = [optProject, optPackage, optNoPackage, optTag, optLevel, optText] as const
