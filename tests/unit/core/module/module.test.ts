/**
 * Tests for module construction.
 */
import { describe, it, expect } from 'vitest';
import { Input, createModule, includeStatement } from '../../../../src/core/module/module.js';
import type { ModuleOptions } from '../../../../src/core/module/module.js';
import { ModuleError } from '../../../../src/utils/errors.js';

const DEFAULTS: ModuleOptions = { comments: true, prefixes: true, examples: true };

describe('includeStatement', () => {
  it('should point modules at the modules directory', () => {
    expect(includeStatement('concept', 'con_alpha')).toBe('include::modules/con_alpha.adoc[leveloffset=+1]');
    expect(includeStatement('reference', 'ref_gamma')).toBe('include::modules/ref_gamma.adoc[leveloffset=+1]');
  });

  it('should point assemblies at the assemblies directory', () => {
    expect(includeStatement('assembly', 'assembly_guide')).toBe(
      'include::assemblies/assembly_guide.adoc[leveloffset=+1]'
    );
  });

  it('should include snippets without a level offset', () => {
    expect(includeStatement('snippet', 'snip_note')).toBe('include::snippets/snip_note.adoc[]');
  });
});

describe('createModule', () => {
  it('should derive id, file name and include statement from the title', () => {
    const module = createModule('concept', 'My First Concept', DEFAULTS);

    expect(module.moduleType).toBe('concept');
    expect(module.title).toBe('My First Concept');
    expect(module.id).toBe('con_my-first-concept');
    expect(module.fileName).toBe('con_my-first-concept.adoc');
    expect(module.includeStatement).toBe('include::modules/con_my-first-concept.adoc[leveloffset=+1]');
  });

  it('should render the title and anchor into the content', () => {
    const module = createModule('procedure', 'Installing the Tool', DEFAULTS);
    const lines = module.content.split('\n');

    expect(lines[0]).toBe(':_mod-docs-content-type: PROCEDURE');
    expect(lines).toContain('[id="proc_installing-the-tool_{context}"]');
    expect(lines).toContain('= Installing the Tool');
  });

  it('should honor disabled prefixes', () => {
    const module = createModule('reference', 'Command Options', { ...DEFAULTS, prefixes: false });

    expect(module.id).toBe('command-options');
    expect(module.includeStatement).toBe('include::modules/command-options.adoc[leveloffset=+1]');
  });

  it('should return a frozen module', () => {
    expect(Object.isFrozen(createModule('snippet', 'Note', DEFAULTS))).toBe(true);
  });

  it('should not substitute template syntax found in the title', () => {
    const module = createModule('concept', 'Using {{ID}} markers', DEFAULTS);

    expect(module.id).toBe('con_using-id-markers');
    expect(module.content.split('\n')).toContain('= Using {{ID}} markers');
  });

  it('should throw EmptyTitle for a title without letters or digits', () => {
    expect(() => createModule('concept', '---', DEFAULTS)).toThrow(ModuleError);
  });
});

describe('Input', () => {
  it('should return a new input carrying the include statements', () => {
    const input = new Input('assembly', 'Guide', DEFAULTS);
    const populated = input.include(['include::modules/con_a.adoc[leveloffset=+1]']);

    expect(populated).not.toBe(input);
    expect(populated.includes).toEqual(['include::modules/con_a.adoc[leveloffset=+1]']);
    expect(input.includes).toEqual([]);
  });

  it('should reject include statements on a non-assembly', () => {
    const input = new Input('concept', 'Alpha', DEFAULTS);

    expect(() => input.include(['include::modules/con_b.adoc[leveloffset=+1]'])).toThrow(
      'Only assemblies can include other modules, got a concept'
    );
  });

  it('should render a single include statement verbatim', () => {
    const alpha = createModule('concept', 'Alpha', DEFAULTS);
    const assembly = new Input('assembly', 'Guide', DEFAULTS).include([alpha.includeStatement]).toModule();

    expect(assembly.content.split('\n')).toContain(alpha.includeStatement);
  });

  it('should render include statements in the order received', () => {
    const statements = [
      'include::modules/proc_b.adoc[leveloffset=+1]',
      'include::modules/con_a.adoc[leveloffset=+1]',
    ];
    const assembly = new Input('assembly', 'Guide', DEFAULTS).include(statements).toModule();

    expect(assembly.content).toContain(statements.join('\n'));
  });
});
