// src/core/program/validate.ts
// Name resolution and linking: ParsedProgram -> Program.

import type { Instruction, ParsedProgram, RegionRef } from "../ast";
import type { Diagnostic } from "../../outcome/diagnostic";
import { makeDiagnostic } from "../../outcome/codes";
import {
  DuplicateNameError,
  MissingEntryPointError,
  UndefinedReferenceError,
  ValidationError,
} from "../errors";
import { DEFAULT_LOADER_CONFIG } from "../config/config";
import type { Op, Procedure, RegionInfo, Target } from "./program";
import { Program } from "./program";

export type ValidateOptions = {
  maxRegionCapacity?: number;
};

export type ValidationReport = {
  errors: ValidationError[];
  warnings: Diagnostic[];
};

function walk(body: Instruction[], visit: (ins: Instruction) => void): void {
  for (const ins of body) {
    visit(ins);
    if (ins.tag === "Loop") walk(ins.body, visit);
    if (ins.tag === "Call" && ins.callee.tag === "Anonymous") walk(ins.callee.proc.body, visit);
  }
}

/**
 * Collect every violation instead of stopping at the first one. Errors come
 * out in a fixed order: duplicates, capacities, entry points, references.
 */
export function checkProgram(parsed: ParsedProgram, options: ValidateOptions = {}): ValidationReport {
  const limit = options.maxRegionCapacity ?? DEFAULT_LOADER_CONFIG.maxRegionCapacity;
  const errors: ValidationError[] = [];
  const warnings: Diagnostic[] = [];

  const regionNames = new Set<string>();
  for (const r of parsed.regions) {
    if (regionNames.has(r.name)) errors.push(new DuplicateNameError("region", r.name, r.span));
    regionNames.add(r.name);
  }
  const procNames = new Set<string>();
  for (const p of parsed.procedures) {
    if (procNames.has(p.name)) errors.push(new DuplicateNameError("procedure", p.name, p.span));
    procNames.add(p.name);
  }

  for (const r of parsed.regions) {
    if (r.capacity > limit) {
      errors.push(new ValidationError(makeDiagnostic("E0203", { name: r.name, capacity: r.capacity, limit }, r.span)));
    }
  }

  if (!regionNames.has("main")) errors.push(new MissingEntryPointError("region"));
  if (!procNames.has("main")) errors.push(new MissingEntryPointError("procedure"));

  const calledProcs = new Set<string>(["main"]);
  const usedRegions = new Set<string>(["main"]);
  const checkRef = (ref: RegionRef | null) => {
    if (ref?.tag !== "Named") return;
    usedRegions.add(ref.name);
    if (!regionNames.has(ref.name)) errors.push(new UndefinedReferenceError("region", ref.name, ref.span));
  };

  for (const p of parsed.procedures) {
    walk(p.body, (ins) => {
      switch (ins.tag) {
        case "Send":
        case "Receive":
          checkRef(ins.target);
          break;
        case "Call":
          if (ins.callee.tag === "Named") {
            calledProcs.add(ins.callee.name);
            if (!procNames.has(ins.callee.name)) {
              errors.push(new UndefinedReferenceError("procedure", ins.callee.name, ins.callee.span));
            }
          }
          checkRef(ins.clause);
          break;
      }
    });
  }

  for (const p of parsed.procedures) {
    if (!calledProcs.has(p.name)) warnings.push(makeDiagnostic("W0001", { name: p.name }, p.span));
  }
  for (const r of parsed.regions) {
    if (!usedRegions.has(r.name)) warnings.push(makeDiagnostic("W0002", { name: r.name }, r.span));
  }

  return { errors, warnings };
}

/** Throws the first violation checkProgram finds; otherwise links. */
export function validateProgram(parsed: ParsedProgram, options: ValidateOptions = {}): Program {
  const { errors } = checkProgram(parsed, options);
  if (errors.length > 0) throw errors[0];
  return linkProgram(parsed);
}

/** Resolve names to slots and Procedure objects. Expects a program checkProgram accepted. */
export function linkProgram(parsed: ParsedProgram): Program {
  const regions: RegionInfo[] = parsed.regions.map((r) => ({ name: r.name, capacity: r.capacity }));
  const slots = new Map(regions.map((r, slot) => [r.name, slot]));

  // Create every named procedure up front so recursive and forward calls
  // can point at the same object.
  const procedures = new Map<string, Procedure>();
  for (const p of parsed.procedures) {
    procedures.set(p.name, { name: p.name, label: p.name, body: [] });
  }

  const target = (ref: RegionRef): Target => {
    if (ref.tag === "Back") return { tag: "Back" };
    const slot = slots.get(ref.name);
    if (slot === undefined) throw new Error(`link: unresolved region ${ref.name}`);
    return { tag: "Region", slot };
  };

  const resolve = (body: Instruction[]): Op[] =>
    body.map((ins): Op => {
      switch (ins.tag) {
        case "Inc":
        case "Dec":
        case "Right":
        case "Left":
        case "Reset":
        case "Output":
          return { tag: ins.tag };
        case "Input":
          return { tag: "Input", span: ins.span };
        case "Quote":
          return { tag: "Quote", byte: ins.byte };
        case "Loop":
          return { tag: "Loop", body: resolve(ins.body) };
        case "Send":
        case "Receive":
          return { tag: ins.tag, target: target(ins.target) };
        case "Call": {
          const clause = ins.clause ? target(ins.clause) : null;
          if (ins.callee.tag === "Anonymous") {
            const anon = ins.callee.proc;
            return { tag: "Call", proc: { name: null, label: anon.label, body: resolve(anon.body) }, clause, span: ins.span };
          }
          const proc = procedures.get(ins.callee.name);
          if (!proc) throw new Error(`link: unresolved procedure ${ins.callee.name}`);
          return { tag: "Call", proc, clause, span: ins.span };
        }
      }
    });

  for (const p of parsed.procedures) {
    const proc = procedures.get(p.name);
    if (proc) proc.body = resolve(p.body);
  }

  return new Program(regions, procedures);
}
