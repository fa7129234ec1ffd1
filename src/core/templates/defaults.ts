/**
 * Embedded AsciiDoc templates, one per module type.
 *
 * Variables: ID, TITLE, FILE_NAME, CONTENT_TYPE, INCLUDES.
 * Toggles: COMMENTS, EXAMPLES.
 */
import type { ModuleType } from '../module/types.js';

/** First line of every example block. */
export const EXAMPLE_MARKER = '// Example content';

const MODULE_HEADER_COMMENTS = `{{#if COMMENTS}}
// Base the file name and the ID on the module title. For example:
// * file name: {{FILE_NAME}}
// * ID: [id="{{ID}}_{context}"]
// * Title: = {{TITLE}}
//
// The ID is an anchor that links to the module. Avoid changing it after the module has been published to ensure existing links are not broken.
{{/if}}`;

const ASSEMBLY_TEMPLATE = `:_mod-docs-content-type: {{CONTENT_TYPE}}
ifdef::context[:parent-context-of-{{ID}}: {context}]
{{#if COMMENTS}}
// Base the file name and the ID on the assembly title. For example:
// * file name: {{FILE_NAME}}
// * ID: [id="{{ID}}_{context}"]
// * Title: = {{TITLE}}
//
// The ID is an anchor that links to the assembly. Avoid changing it after the assembly has been published to ensure existing links are not broken.
{{/if}}

[id="{{ID}}_{context}"]
= {{TITLE}}

:context: {{ID}}

{{#if COMMENTS}}
// The \`context\` attribute enables module reuse. Every module ID includes {context}, which gives the module a unique ID even when you include it several times in the same guide.

{{/if}}
[role="_abstract"]
This paragraph is the assembly introduction. It explains what the user will accomplish by working through the modules in the assembly.

{{#if INCLUDES}}
{{INCLUDES}}

{{/if}}
{{#if COMMENTS}}
// Restore the context that was active before this assembly.
{{/if}}
ifdef::parent-context-of-{{ID}}[:context: {parent-context-of-{{ID}}}]
ifndef::parent-context-of-{{ID}}[:!context:]
{{#if EXAMPLES}}

${EXAMPLE_MARKER}
// Include every module with a leveloffset that matches its place in the assembly:
//include::modules/con_example-concept.adoc[leveloffset=+1]
//include::modules/proc_example-procedure.adoc[leveloffset=+1]
{{/if}}
`;

const CONCEPT_TEMPLATE = `:_mod-docs-content-type: {{CONTENT_TYPE}}
${MODULE_HEADER_COMMENTS}

[id="{{ID}}_{context}"]
= {{TITLE}}

{{#if COMMENTS}}
// In the title of concept modules, include nouns or noun phrases that are used in the body text. This helps readers and search engines find the information quickly.
// Do not start the title of concept modules with a verb.

{{/if}}
[role="_abstract"]
Write a short introductory paragraph that provides an overview of the module.

{{#if COMMENTS}}
// The contents of a concept module give the user descriptions and explanations needed to understand and use a product.
// Look at nouns and noun phrases in related procedure modules and assemblies to find the concepts to explain to users.

{{/if}}
Explain the concept here.
{{#if EXAMPLES}}

${EXAMPLE_MARKER}
.Additional resources

* A bulleted list of links to other closely-related material. These links can include \`link:\` and \`xref:\` macros.
{{/if}}
`;

const PROCEDURE_TEMPLATE = `:_mod-docs-content-type: {{CONTENT_TYPE}}
${MODULE_HEADER_COMMENTS}

[id="{{ID}}_{context}"]
= {{TITLE}}

{{#if COMMENTS}}
// Start the title of a procedure module with a gerund, such as Creating, Installing, or Deploying.

{{/if}}
[role="_abstract"]
Write a short introductory paragraph that provides an overview of the module.

{{#if COMMENTS}}
// List the conditions that must be satisfied before the user starts following this procedure. Delete the section if the procedure has no prerequisites.

{{/if}}
.Prerequisites

* A bulleted list of conditions that must be satisfied before the user starts following this procedure.

{{#if COMMENTS}}
// Start each step with an active verb and keep to one command or action per step.

{{/if}}
.Procedure

. Start each step with an active verb.

. Include one command or action per step.

. Use an unnumbered bullet (*) if the procedure includes only one step.

.Verification

Provide the user with verification methods for the procedure, such as expected output or commands that confirm success or failure.
{{#if EXAMPLES}}

${EXAMPLE_MARKER}
.Example step

. Display the installed version:
+
[source,terminal]
----
$ example-tool --version
----
{{/if}}
`;

const REFERENCE_TEMPLATE = `:_mod-docs-content-type: {{CONTENT_TYPE}}
${MODULE_HEADER_COMMENTS}

[id="{{ID}}_{context}"]
= {{TITLE}}

{{#if COMMENTS}}
// In the title of a reference module, include nouns that are used in the body text, such as "Keyboard shortcuts for ___" or "Command options for ___".

{{/if}}
[role="_abstract"]
Write a short introductory paragraph that provides an overview of the module.

{{#if COMMENTS}}
// A reference module provides data that users might want to look up, but do not need to remember. Organize it in a table or a labeled list.

{{/if}}
Labeled list::
Term 1::: Definition
Term 2::: Definition
{{#if EXAMPLES}}

${EXAMPLE_MARKER}
.Example table
[options="header"]
|====
|Column 1|Column 2
|Row 1, column 1|Row 1, column 2
|Row 2, column 1|Row 2, column 2
|====
{{/if}}
`;

const SNIPPET_TEMPLATE = `:_mod-docs-content-type: {{CONTENT_TYPE}}
{{#if COMMENTS}}
// A snippet is a piece of content that other modules and assemblies include.
// Snippets carry no ID and no level-0 title, so nothing can cross-reference them.
{{/if}}

.{{TITLE}}
Write the reusable content here.
{{#if EXAMPLES}}

${EXAMPLE_MARKER}
NOTE: This is an example admonition. Snippets often hold admonitions that repeat across modules.
{{/if}}
`;

export const MODULE_TEMPLATES: Record<ModuleType, string> = {
  assembly: ASSEMBLY_TEMPLATE,
  concept: CONCEPT_TEMPLATE,
  procedure: PROCEDURE_TEMPLATE,
  reference: REFERENCE_TEMPLATE,
  snippet: SNIPPET_TEMPLATE,
};
