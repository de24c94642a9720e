/**
 * Spring Boot (Java) Renderer
 *
 * Layered module per entity under `<namespace>/<module>/`:
 * domain/entity, application/dto, application/service,
 * infrastructure/repository and infrastructure/controller.
 */

import type { EntityBlueprint } from '../../generators/blueprint.js'
import { capitalize, toPascalCase } from '../../core/naming.js'
import { entityPackage, importBlock, packagePath, routeFor } from '../jvm.js'
import { joinLines, quote, TargetRenderer } from '../renderer.js'
import type { ProjectContext, RenderedFile } from '../renderer.js'

const MAIN = 'src/main/java'
const TEST = 'src/test/java'

function modulePackage(bp: EntityBlueprint): string {
  return `${bp.namespace}.${bp.entity.moduleName}`
}

function file(root: string, pkg: string, className: string, lines: string[]): RenderedFile {
  return { path: `${root}/${packagePath(pkg)}/${className}.java`, content: joinLines(lines) }
}

function accessors(type: string, name: string): string[] {
  const suffix = capitalize(name.replace(/_$/, ''))
  return [
    '',
    `    public ${type} get${suffix}() {`,
    `        return ${name};`,
    '    }',
    '',
    `    public void set${suffix}(${type} ${name}) {`,
    `        this.${name} = ${name};`,
    '    }',
  ]
}

export class SpringRenderer extends TargetRenderer {
  shared(project: ProjectContext): RenderedFile[] {
    const commonPackage = `${project.namespace}.common.domain`
    const base = [
      `package ${commonPackage};`,
      '',
      ...importBlock([
        'jakarta.persistence.Column',
        'jakarta.persistence.GeneratedValue',
        'jakarta.persistence.GenerationType',
        'jakarta.persistence.Id',
        'jakarta.persistence.MappedSuperclass',
        'java.time.Instant',
        'org.hibernate.annotations.CreationTimestamp',
        'org.hibernate.annotations.UpdateTimestamp',
      ]),
      '',
      '@MappedSuperclass',
      'public abstract class BaseEntity {',
      '',
      '    @Id',
      '    @GeneratedValue(strategy = GenerationType.IDENTITY)',
      '    private Long id;',
      '',
      '    @Column(name = "active", nullable = false)',
      '    private boolean active = true;',
      '',
      '    @CreationTimestamp',
      '    @Column(name = "created_at", nullable = false, updatable = false)',
      '    private Instant createdAt;',
      '',
      '    @UpdateTimestamp',
      '    @Column(name = "updated_at")',
      '    private Instant updatedAt;',
      '',
      '    @Column(name = "deleted_at")',
      '    private Instant deletedAt;',
      ...accessors('Long', 'id'),
      ...accessors('boolean', 'active'),
      ...accessors('Instant', 'createdAt'),
      ...accessors('Instant', 'updatedAt'),
      ...accessors('Instant', 'deletedAt'),
      '}',
    ]

    const appClass = `${toPascalCase(project.projectName)}Application`
    const application = [
      `package ${project.namespace};`,
      '',
      'import org.springframework.boot.SpringApplication;',
      'import org.springframework.boot.autoconfigure.SpringBootApplication;',
      '',
      '@SpringBootApplication',
      `public class ${appClass} {`,
      '',
      '    public static void main(String[] args) {',
      `        SpringApplication.run(${appClass}.class, args);`,
      '    }',
      '}',
    ]

    return [file(MAIN, commonPackage, 'BaseEntity', base), file(MAIN, project.namespace, appClass, application)]
  }

  protected entity(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const pkg = entityPackage(bp.namespace, entity)
    const imports = new Set<string>([...bp.imports, `${bp.namespace}.common.domain.BaseEntity`, 'jakarta.persistence.Entity', 'jakarta.persistence.Table'])
    const body: string[] = []
    const members: Array<[string, string]> = []

    for (const field of bp.fields) {
      imports.add('jakarta.persistence.Column')
      const attrs = [`name = ${quote(field.columnName)}`]
      if (!field.nullable) attrs.push('nullable = false')
      if (field.unique) attrs.push('unique = true')
      if (field.length !== undefined) attrs.push(`length = ${field.length}`)
      if (field.precision !== undefined) attrs.push(`precision = ${field.precision}`)
      if (field.scale !== undefined) attrs.push(`scale = ${field.scale}`)
      body.push('')
      if (field.columnDefault !== undefined) {
        imports.add('org.hibernate.annotations.ColumnDefault')
        body.push(`    @ColumnDefault(${quote(field.columnDefault)})`)
      }
      body.push(`    @Column(${attrs.join(', ')})`, `    private ${field.type} ${field.name};`)
      members.push([field.type, field.name])
    }

    for (const reference of bp.references) {
      const annotation = reference.kind === 'one-to-one' ? 'OneToOne' : 'ManyToOne'
      imports.add(`jakarta.persistence.${annotation}`).add('jakarta.persistence.JoinColumn').add('jakarta.persistence.FetchType')
      if (reference.target.entityName !== entity.entityName) imports.add(`${entityPackage(bp.namespace, reference.target)}.${reference.target.entityName}`)
      const join = [`name = ${quote(reference.columnName)}`]
      if (!reference.nullable) join.push('nullable = false')
      if (reference.unique) join.push('unique = true')
      body.push(
        '',
        `    @${annotation}(fetch = FetchType.LAZY)`,
        `    @JoinColumn(${join.join(', ')})`,
        `    private ${reference.target.entityName} ${reference.name};`,
      )
      members.push([reference.target.entityName, reference.name])
    }

    for (const collection of bp.collections) {
      imports.add('jakarta.persistence.OneToMany').add('jakarta.persistence.CascadeType').add('java.util.HashSet').add('java.util.Set')
      if (collection.element.entityName !== entity.entityName) imports.add(`${entityPackage(bp.namespace, collection.element)}.${collection.element.entityName}`)
      const cascade = collection.cascade.map((kind) => `CascadeType.${kind.toUpperCase()}`).join(', ')
      body.push(
        '',
        `    @OneToMany(mappedBy = ${quote(collection.mappedBy)}, cascade = {${cascade}})`,
        `    private ${collection.type} ${collection.name} = new HashSet<>();`,
      )
      members.push([collection.type, collection.name])
    }

    for (const back of bp.backReferences) {
      imports.add('jakarta.persistence.OneToOne').add('jakarta.persistence.FetchType')
      if (back.source.entityName !== entity.entityName) imports.add(`${entityPackage(bp.namespace, back.source)}.${back.source.entityName}`)
      body.push(
        '',
        `    @OneToOne(mappedBy = ${quote(back.mappedBy)}, fetch = FetchType.LAZY)`,
        `    private ${back.source.entityName} ${back.name};`,
      )
      members.push([back.source.entityName, back.name])
    }

    for (const join of bp.joins) {
      imports.add('jakarta.persistence.ManyToMany').add('jakarta.persistence.JoinTable').add('jakarta.persistence.JoinColumn')
      imports.add('java.util.HashSet').add('java.util.Set')
      if (join.element.entityName !== entity.entityName) imports.add(`${entityPackage(bp.namespace, join.element)}.${join.element.entityName}`)
      body.push(
        '',
        '    @ManyToMany',
        '    @JoinTable(',
        `        name = ${quote(join.joinTable)},`,
        `        joinColumns = @JoinColumn(name = ${quote(join.joinColumn)}),`,
        `        inverseJoinColumns = @JoinColumn(name = ${quote(join.inverseJoinColumn)})`,
        '    )',
        `    private ${join.type} ${join.name} = new HashSet<>();`,
      )
      members.push([join.type, join.name])
    }

    const table: string[] = []
    if (bp.indexes.length > 0) {
      imports.add('jakarta.persistence.Index')
      table.push(`@Table(name = ${quote(entity.tableName)}, indexes = {`)
      bp.indexes.forEach((index, position) => {
        const comma = position < bp.indexes.length - 1 ? ',' : ''
        table.push(
          `    @Index(name = ${quote(index.name)}, columnList = ${quote(index.columns.join(', '))}${index.unique ? ', unique = true' : ''})${comma}`,
        )
      })
      table.push('})')
    } else {
      table.push(`@Table(name = ${quote(entity.tableName)})`)
    }

    const lines = [
      `package ${pkg};`,
      '',
      ...importBlock(imports),
      '',
      ...(bp.comment ? ['/**', ` * ${bp.comment}`, ' */'] : []),
      '@Entity',
      ...table,
      `public class ${entity.entityName} extends BaseEntity {`,
      ...body,
      ...members.flatMap(([type, name]) => accessors(type, name)),
      '}',
    ]
    return [file(MAIN, pkg, entity.entityName, lines)]
  }

  protected dto(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const pkg = `${modulePackage(bp)}.application.dto`
    const imports = new Set<string>([...bp.imports, `${entityPackage(bp.namespace, entity)}.${entity.entityName}`])
    const components: string[] = [`        ${bp.primaryKeyType} id`]
    const fromArgs: string[] = [`${entity.variableName}.getId()`]

    for (const field of bp.fields) {
      const annotations: string[] = []
      if (!field.nullable) {
        imports.add(field.type === 'String' ? 'jakarta.validation.constraints.NotBlank' : 'jakarta.validation.constraints.NotNull')
        annotations.push(field.type === 'String' ? '@NotBlank' : '@NotNull')
      }
      if (field.length !== undefined) {
        imports.add('jakarta.validation.constraints.Size')
        annotations.push(`@Size(max = ${field.length})`)
      }
      components.push(`        ${[...annotations, field.type, field.name].join(' ')}`)
      fromArgs.push(`${entity.variableName}.get${capitalize(field.name.replace(/_$/, ''))}()`)
    }
    for (const reference of bp.references) {
      if (!reference.nullable) imports.add('jakarta.validation.constraints.NotNull')
      components.push(`        ${reference.nullable ? '' : '@NotNull '}${reference.idType} ${reference.idName}`)
      const getter = `${entity.variableName}.get${capitalize(reference.name)}()`
      fromArgs.push(reference.nullable ? `${getter} == null ? null : ${getter}.getId()` : `${getter}.getId()`)
    }
    for (const join of bp.joins) {
      imports.add('java.util.Set').add('java.util.stream.Collectors')
      components.push(`        Set<Long> ${join.name}Ids`)
      fromArgs.push(`${entity.variableName}.get${capitalize(join.name)}().stream().map(e -> e.getId()).collect(Collectors.toSet())`)
    }

    const lines = [
      `package ${pkg};`,
      '',
      ...importBlock(imports),
      '',
      `public record ${entity.entityName}DTO(`,
      components.join(',\n'),
      ') {',
      '',
      `    public static ${entity.entityName}DTO from(${entity.entityName} ${entity.variableName}) {`,
      `        return new ${entity.entityName}DTO(`,
      fromArgs.map((arg) => `            ${arg}`).join(',\n'),
      '        );',
      '    }',
      '}',
    ]
    return [file(MAIN, pkg, `${entity.entityName}DTO`, lines)]
  }

  protected repository(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const pkg = `${modulePackage(bp)}.infrastructure.repository`
    const imports = new Set<string>([
      `${entityPackage(bp.namespace, entity)}.${entity.entityName}`,
      'org.springframework.data.jpa.repository.JpaRepository',
      'org.springframework.stereotype.Repository',
    ])
    const body: string[] = []
    for (const procedure of bp.procedures) {
      imports.add('org.springframework.data.jpa.repository.query.Procedure')
      for (const entry of bp.imports) imports.add(entry)
      const params = procedure.parameters.map((parameter) => `${parameter.type} ${parameter.name}`).join(', ')
      body.push(
        '',
        `    @Procedure(procedureName = ${quote(procedure.name)})`,
        `    ${procedure.returnType ?? 'void'} ${procedure.methodName}(${params});`,
      )
    }

    const lines = [
      `package ${pkg};`,
      '',
      ...importBlock(imports),
      '',
      '@Repository',
      `public interface ${entity.entityName}Repository extends JpaRepository<${entity.entityName}, ${bp.primaryKeyType}> {`,
      ...body,
      '}',
    ]
    return [file(MAIN, pkg, `${entity.entityName}Repository`, lines)]
  }

  protected service(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const name = entity.entityName
    const repo = `${entity.variableName}Repository`
    const pkg = `${modulePackage(bp)}.application.service`
    const imports = [
      `${entityPackage(bp.namespace, entity)}.${name}`,
      `${modulePackage(bp)}.application.dto.${name}DTO`,
      `${modulePackage(bp)}.infrastructure.repository.${name}Repository`,
      'jakarta.persistence.EntityNotFoundException',
      'java.util.List',
      'org.springframework.stereotype.Service',
      'org.springframework.transaction.annotation.Transactional',
    ]
    const assignments = bp.fields.map((field) => {
      const suffix = capitalize(field.name.replace(/_$/, ''))
      return `        ${entity.variableName}.set${suffix}(dto.${field.name}());`
    })

    const lines = [
      `package ${pkg};`,
      '',
      ...importBlock(imports),
      '',
      '@Service',
      '@Transactional',
      `public class ${name}Service {`,
      '',
      `    private final ${name}Repository ${repo};`,
      '',
      `    public ${name}Service(${name}Repository ${repo}) {`,
      `        this.${repo} = ${repo};`,
      '    }',
      '',
      '    @Transactional(readOnly = true)',
      `    public List<${name}DTO> findAll() {`,
      `        return ${repo}.findAll().stream().map(${name}DTO::from).toList();`,
      '    }',
      '',
      '    @Transactional(readOnly = true)',
      `    public ${name}DTO findById(${bp.primaryKeyType} id) {`,
      `        return ${name}DTO.from(require(id));`,
      '    }',
      '',
      `    public ${name}DTO create(${name}DTO dto) {`,
      `        ${name} ${entity.variableName} = new ${name}();`,
      ...assignments,
      `        return ${name}DTO.from(${repo}.save(${entity.variableName}));`,
      '    }',
      '',
      `    public ${name}DTO update(${bp.primaryKeyType} id, ${name}DTO dto) {`,
      `        ${name} ${entity.variableName} = require(id);`,
      ...assignments,
      `        return ${name}DTO.from(${repo}.save(${entity.variableName}));`,
      '    }',
      '',
      `    public void delete(${bp.primaryKeyType} id) {`,
      `        ${name} ${entity.variableName} = require(id);`,
      `        ${entity.variableName}.setActive(false);`,
      `        ${repo}.save(${entity.variableName});`,
      '    }',
      '',
      `    private ${name} require(${bp.primaryKeyType} id) {`,
      `        return ${repo}.findById(id)`,
      `                .orElseThrow(() -> new EntityNotFoundException("${name} " + id + " not found"));`,
      '    }',
      '}',
    ]
    return [file(MAIN, pkg, `${name}Service`, lines)]
  }

  protected controller(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const name = entity.entityName
    const service = `${entity.variableName}Service`
    const pkg = `${modulePackage(bp)}.infrastructure.controller`
    const imports = [
      `${modulePackage(bp)}.application.dto.${name}DTO`,
      `${modulePackage(bp)}.application.service.${name}Service`,
      'jakarta.validation.Valid',
      'java.util.List',
      'org.springframework.http.HttpStatus',
      'org.springframework.web.bind.annotation.DeleteMapping',
      'org.springframework.web.bind.annotation.GetMapping',
      'org.springframework.web.bind.annotation.PathVariable',
      'org.springframework.web.bind.annotation.PostMapping',
      'org.springframework.web.bind.annotation.PutMapping',
      'org.springframework.web.bind.annotation.RequestBody',
      'org.springframework.web.bind.annotation.RequestMapping',
      'org.springframework.web.bind.annotation.ResponseStatus',
      'org.springframework.web.bind.annotation.RestController',
    ]
    const lines = [
      `package ${pkg};`,
      '',
      ...importBlock(imports),
      '',
      '@RestController',
      `@RequestMapping("/api/${routeFor(entity)}")`,
      `public class ${name}Controller {`,
      '',
      `    private final ${name}Service ${service};`,
      '',
      `    public ${name}Controller(${name}Service ${service}) {`,
      `        this.${service} = ${service};`,
      '    }',
      '',
      '    @GetMapping',
      `    public List<${name}DTO> findAll() {`,
      `        return ${service}.findAll();`,
      '    }',
      '',
      '    @GetMapping("/{id}")',
      `    public ${name}DTO findById(@PathVariable ${bp.primaryKeyType} id) {`,
      `        return ${service}.findById(id);`,
      '    }',
      '',
      '    @PostMapping',
      '    @ResponseStatus(HttpStatus.CREATED)',
      `    public ${name}DTO create(@Valid @RequestBody ${name}DTO dto) {`,
      `        return ${service}.create(dto);`,
      '    }',
      '',
      '    @PutMapping("/{id}")',
      `    public ${name}DTO update(@PathVariable ${bp.primaryKeyType} id, @Valid @RequestBody ${name}DTO dto) {`,
      `        return ${service}.update(id, dto);`,
      '    }',
      '',
      '    @DeleteMapping("/{id}")',
      '    @ResponseStatus(HttpStatus.NO_CONTENT)',
      `    public void delete(@PathVariable ${bp.primaryKeyType} id) {`,
      `        ${service}.delete(id);`,
      '    }',
      '}',
    ]
    return [file(MAIN, pkg, `${name}Controller`, lines)]
  }

  protected test(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const name = entity.entityName
    const pkg = `${modulePackage(bp)}.application.service`
    const imports = [
      `${entityPackage(bp.namespace, entity)}.${name}`,
      `${modulePackage(bp)}.infrastructure.repository.${name}Repository`,
      'jakarta.persistence.EntityNotFoundException',
      'java.util.Optional',
      'org.junit.jupiter.api.Test',
      'org.junit.jupiter.api.extension.ExtendWith',
      'org.mockito.InjectMocks',
      'org.mockito.Mock',
      'org.mockito.junit.jupiter.MockitoExtension',
    ]
    const lines = [
      `package ${pkg};`,
      '',
      ...importBlock(imports),
      '',
      'import static org.assertj.core.api.Assertions.assertThatThrownBy;',
      'import static org.mockito.Mockito.verify;',
      'import static org.mockito.Mockito.when;',
      '',
      '@ExtendWith(MockitoExtension.class)',
      `class ${name}ServiceTest {`,
      '',
      '    @Mock',
      `    private ${name}Repository repository;`,
      '',
      '    @InjectMocks',
      `    private ${name}Service service;`,
      '',
      '    @Test',
      '    void findByIdThrowsWhenMissing() {',
      '        when(repository.findById(1L)).thenReturn(Optional.empty());',
      '        assertThatThrownBy(() -> service.findById(1L)).isInstanceOf(EntityNotFoundException.class);',
      '    }',
      '',
      '    @Test',
      '    void deleteDeactivatesEntity() {',
      `        ${name} ${entity.variableName} = new ${name}();`,
      `        when(repository.findById(2L)).thenReturn(Optional.of(${entity.variableName}));`,
      '        service.delete(2L);',
      `        verify(repository).save(${entity.variableName});`,
      '    }',
      '}',
    ]
    return [file(TEST, pkg, `${name}ServiceTest`, lines)]
  }
}
