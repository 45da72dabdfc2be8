// GLSL ES 1.00 → GLSL ES 3.00 source rewriting.
//
// Purely textual. Every rule matches only 1.00 constructs, so running the
// transpiler on its own output changes nothing.

export type ShaderDialect = "glsl100" | "glsl300es";

export const FRAG_COLOR_OUTPUT = "GL_FragColor";
const FRAG_COLOR_DECLARATION = `out mediump vec4 ${FRAG_COLOR_OUTPUT};`;

const EXTENSION_PRAGMA = /^[ \t]*#[ \t]*extension[ \t]+GL_(?:OES_standard_derivatives|EXT_shader_texture_lod)[ \t]*:[ \t]*(?:enable|require)[ \t]*(?:\r?\n|$)/gm;
const VERSION_100 = /^[ \t]*#[ \t]*version[ \t]+100[ \t]*\r?$/m;
const ANY_VERSION = /^[ \t]*#[ \t]*version\b.*$/m;
const TEXTURE_FUNCTIONS = /\btexture(?:1D|2D|3D|Cube)(Proj)?(Lod|Grad)?(?:EXT)?\b/g;

const COMMENTS = /\/\*[\s\S]*?\*\/|\/\/[^\n]*/g;

function stripComments(source: string): string {
  return source.replace(COMMENTS, " ");
}

export function transpile(source: string, target: ShaderDialect): string {
  if (target === "glsl100") return source;

  let out = source.replace(EXTENSION_PRAGMA, "");

  const writesFragColor = /\bgl_FragColor\b/.test(out);
  if (writesFragColor) out = out.replace(/\bgl_FragColor\b/g, FRAG_COLOR_OUTPUT);

  const isVertexStage = /\battribute\b/.test(stripComments(out));
  out = out.replace(/\battribute\b/g, "in");
  out = out.replace(/\bvarying\b/g, isVertexStage ? "out" : "in");

  out = out.replace(TEXTURE_FUNCTIONS, (_match, proj: string | undefined, variant: string | undefined) => {
    return `texture${proj ?? ""}${variant ?? ""}`;
  });

  const header = writesFragColor ? `#version 300 es\n${FRAG_COLOR_DECLARATION}` : "#version 300 es";
  if (VERSION_100.test(out)) {
    out = out.replace(VERSION_100, header);
  } else if (!ANY_VERSION.test(out)) {
    out = `${header}\n${out}`;
  } else if (writesFragColor) {
    // Already 3.00 but still writing the legacy output.
    out = out.replace(ANY_VERSION, (line) => `${line}\n${FRAG_COLOR_DECLARATION}`);
  }
  return out;
}

/** Numeric dialect declared by the guest (100 or 300) to a dialect name. */
export function dialectFromVersion(version: number): ShaderDialect | null {
  if (version === 100) return "glsl100";
  if (version === 300) return "glsl300es";
  return null;
}
