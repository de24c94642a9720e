/**
 * Spring Boot (Kotlin) Renderer
 *
 * Same package layout as the Java target; entities are open classes with
 * mutable properties, DTOs are data classes.
 */

import type { EntityBlueprint, EntityRef } from '../../generators/blueprint.js'
import { toPascalCase } from '../../core/naming.js'
import { entityPackage, importBlock, packagePath, routeFor } from '../jvm.js'
import { joinLines, quote, TargetRenderer } from '../renderer.js'
import type { ProjectContext, RenderedFile } from '../renderer.js'

const MAIN = 'src/main/kotlin'
const TEST = 'src/test/kotlin'

function modulePackage(bp: EntityBlueprint): string {
  return `${bp.namespace}.${bp.entity.moduleName}`
}

function file(root: string, pkg: string, name: string, lines: string[]): RenderedFile {
  return { path: `${root}/${packagePath(pkg)}/${name}.kt`, content: joinLines(lines) }
}

function kotlinImports(imports: Iterable<string>): string[] {
  return importBlock(imports, '')
}

export class KotlinSpringRenderer extends TargetRenderer {
  shared(project: ProjectContext): RenderedFile[] {
    const commonPackage = `${project.namespace}.common.domain`
    const base = [
      `package ${commonPackage}`,
      '',
      ...kotlinImports([
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
      'abstract class BaseEntity {',
      '    @Id',
      '    @GeneratedValue(strategy = GenerationType.IDENTITY)',
      '    var id: Long? = null',
      '',
      '    @Column(name = "active", nullable = false)',
      '    var active: Boolean = true',
      '',
      '    @CreationTimestamp',
      '    @Column(name = "created_at", nullable = false, updatable = false)',
      '    var createdAt: Instant? = null',
      '',
      '    @UpdateTimestamp',
      '    @Column(name = "updated_at")',
      '    var updatedAt: Instant? = null',
      '',
      '    @Column(name = "deleted_at")',
      '    var deletedAt: Instant? = null',
      '}',
    ]

    const appClass = `${toPascalCase(project.projectName)}Application`
    const application = [
      `package ${project.namespace}`,
      '',
      'import org.springframework.boot.autoconfigure.SpringBootApplication',
      'import org.springframework.boot.runApplication',
      '',
      '@SpringBootApplication',
      `class ${appClass}`,
      '',
      'fun main(args: Array<String>) {',
      `    runApplication<${appClass}>(*args)`,
      '}',
    ]

    return [file(MAIN, commonPackage, 'BaseEntity', base), file(MAIN, project.namespace, appClass, application)]
  }

  protected entity(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const pkg = entityPackage(bp.namespace, entity)
    const imports = new Set<string>([...bp.imports, `${bp.namespace}.common.domain.BaseEntity`, 'jakarta.persistence.Entity', 'jakarta.persistence.Table'])
    const body: string[] = []
    const importEntity = (ref: EntityRef): void => {
      if (ref.entityName !== entity.entityName) imports.add(`${entityPackage(bp.namespace, ref)}.${ref.entityName}`)
    }

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
      body.push(`    @Column(${attrs.join(', ')})`, `    var ${field.name}: ${field.type} = ${field.zeroValue}`)
    }

    for (const reference of bp.references) {
      const annotation = reference.kind === 'one-to-one' ? 'OneToOne' : 'ManyToOne'
      imports.add(`jakarta.persistence.${annotation}`).add('jakarta.persistence.JoinColumn').add('jakarta.persistence.FetchType')
      importEntity(reference.target)
      const join = [`name = ${quote(reference.columnName)}`]
      if (!reference.nullable) join.push('nullable = false')
      if (reference.unique) join.push('unique = true')
      body.push(
        '',
        `    @${annotation}(fetch = FetchType.LAZY)`,
        `    @JoinColumn(${join.join(', ')})`,
        `    var ${reference.name}: ${reference.target.entityName}? = null`,
      )
    }

    for (const collection of bp.collections) {
      imports.add('jakarta.persistence.OneToMany').add('jakarta.persistence.CascadeType')
      importEntity(collection.element)
      const cascade = collection.cascade.map((kind) => `CascadeType.${kind.toUpperCase()}`).join(', ')
      body.push(
        '',
        `    @OneToMany(mappedBy = ${quote(collection.mappedBy)}, cascade = [${cascade}])`,
        `    var ${collection.name}: ${collection.type} = mutableSetOf()`,
      )
    }

    for (const back of bp.backReferences) {
      imports.add('jakarta.persistence.OneToOne').add('jakarta.persistence.FetchType')
      importEntity(back.source)
      body.push(
        '',
        `    @OneToOne(mappedBy = ${quote(back.mappedBy)}, fetch = FetchType.LAZY)`,
        `    var ${back.name}: ${back.source.entityName}? = null`,
      )
    }

    for (const join of bp.joins) {
      imports.add('jakarta.persistence.ManyToMany').add('jakarta.persistence.JoinTable').add('jakarta.persistence.JoinColumn')
      importEntity(join.element)
      body.push(
        '',
        '    @ManyToMany',
        '    @JoinTable(',
        `        name = ${quote(join.joinTable)},`,
        `        joinColumns = [JoinColumn(name = ${quote(join.joinColumn)})],`,
        `        inverseJoinColumns = [JoinColumn(name = ${quote(join.inverseJoinColumn)})]`,
        '    )',
        `    var ${join.name}: ${join.type} = mutableSetOf()`,
      )
    }

    const table: string[] = []
    if (bp.indexes.length > 0) {
      imports.add('jakarta.persistence.Index')
      table.push(`@Table(`, `    name = ${quote(entity.tableName)},`, '    indexes = [')
      for (const index of bp.indexes) {
        table.push(
          `        Index(name = ${quote(index.name)}, columnList = ${quote(index.columns.join(', '))}${index.unique ? ', unique = true' : ''}),`,
        )
      }
      table.push('    ]', ')')
    } else {
      table.push(`@Table(name = ${quote(entity.tableName)})`)
    }

    const lines = [
      `package ${pkg}`,
      '',
      ...kotlinImports(imports),
      '',
      '@Entity',
      ...table,
      `class ${entity.entityName} : BaseEntity() {`,
      ...body.slice(1),
      '}',
    ]
    return [file(MAIN, pkg, entity.entityName, lines)]
  }

  protected dto(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const pkg = `${modulePackage(bp)}.application.dto`
    const variable = entity.variableName
    const imports = new Set<string>([...bp.imports, `${entityPackage(bp.namespace, entity)}.${entity.entityName}`])
    const properties: string[] = ['    val id: Long? = null']
    const mapping: string[] = [`        id = ${variable}.id`]

    for (const field of bp.fields) {
      const annotations: string[] = []
      if (!field.nullable && field.type === 'String') {
        imports.add('jakarta.validation.constraints.NotBlank')
        annotations.push('@field:NotBlank')
      }
      if (field.length !== undefined) {
        imports.add('jakarta.validation.constraints.Size')
        annotations.push(`@field:Size(max = ${field.length})`)
      }
      properties.push(`    ${[...annotations, `val ${field.name}: ${field.type}`].join(' ')}`)
      mapping.push(`        ${field.name} = ${variable}.${field.name}`)
    }
    for (const reference of bp.references) {
      properties.push(`    val ${reference.idName}: Long?`)
      mapping.push(`        ${reference.idName} = ${variable}.${reference.name}?.id`)
    }
    for (const join of bp.joins) {
      properties.push(`    val ${join.name}Ids: Set<Long> = emptySet()`)
      mapping.push(`        ${join.name}Ids = ${variable}.${join.name}.mapNotNull { it.id }.toSet()`)
    }

    const lines = [
      `package ${pkg}`,
      '',
      ...kotlinImports(imports),
      '',
      `data class ${entity.entityName}DTO(`,
      properties.join(',\n'),
      ') {',
      '    companion object {',
      `        fun from(${variable}: ${entity.entityName}) = ${entity.entityName}DTO(`,
      mapping.map((line) => `    ${line}`).join(',\n'),
      '        )',
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
      const params = procedure.parameters.map((parameter) => `${parameter.name}: ${parameter.type}`).join(', ')
      body.push(
        '',
        `    @Procedure(procedureName = ${quote(procedure.name)})`,
        `    fun ${procedure.methodName}(${params})${procedure.returnType ? `: ${procedure.returnType}` : ''}`,
      )
    }

    const declaration = `interface ${entity.entityName}Repository : JpaRepository<${entity.entityName}, Long>`
    const lines = [
      `package ${pkg}`,
      '',
      ...kotlinImports(imports),
      '',
      '@Repository',
      ...(body.length > 0 ? [`${declaration} {`, ...body.slice(1), '}'] : [declaration]),
    ]
    return [file(MAIN, pkg, `${entity.entityName}Repository`, lines)]
  }

  protected service(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const name = entity.entityName
    const variable = entity.variableName
    const pkg = `${modulePackage(bp)}.application.service`
    const assignments = bp.fields.map((field) => `            ${field.name} = dto.${field.name}`)
    const lines = [
      `package ${pkg}`,
      '',
      ...kotlinImports([
        `${entityPackage(bp.namespace, entity)}.${name}`,
        `${modulePackage(bp)}.application.dto.${name}DTO`,
        `${modulePackage(bp)}.infrastructure.repository.${name}Repository`,
        'jakarta.persistence.EntityNotFoundException',
        'org.springframework.data.repository.findByIdOrNull',
        'org.springframework.stereotype.Service',
        'org.springframework.transaction.annotation.Transactional',
      ]),
      '',
      '@Service',
      '@Transactional',
      `class ${name}Service(private val repository: ${name}Repository) {`,
      '',
      '    @Transactional(readOnly = true)',
      `    fun findAll(): List<${name}DTO> = repository.findAll().map(${name}DTO::from)`,
      '',
      '    @Transactional(readOnly = true)',
      `    fun findById(id: Long): ${name}DTO = ${name}DTO.from(require(id))`,
      '',
      `    fun create(dto: ${name}DTO): ${name}DTO {`,
      `        val ${variable} = ${name}().apply {`,
      ...assignments,
      '        }',
      `        return ${name}DTO.from(repository.save(${variable}))`,
      '    }',
      '',
      `    fun update(id: Long, dto: ${name}DTO): ${name}DTO {`,
      `        val ${variable} = require(id).apply {`,
      ...assignments,
      '        }',
      `        return ${name}DTO.from(repository.save(${variable}))`,
      '    }',
      '',
      '    fun delete(id: Long) {',
      `        val ${variable} = require(id)`,
      `        ${variable}.active = false`,
      `        repository.save(${variable})`,
      '    }',
      '',
      `    private fun require(id: Long): ${name} =`,
      `        repository.findByIdOrNull(id) ?: throw EntityNotFoundException("${name} $id not found")`,
      '}',
    ]
    return [file(MAIN, pkg, `${name}Service`, lines)]
  }

  protected controller(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const name = entity.entityName
    const pkg = `${modulePackage(bp)}.infrastructure.controller`
    const lines = [
      `package ${pkg}`,
      '',
      ...kotlinImports([
        `${modulePackage(bp)}.application.dto.${name}DTO`,
        `${modulePackage(bp)}.application.service.${name}Service`,
        'jakarta.validation.Valid',
        'org.springframework.http.HttpStatus',
        'org.springframework.web.bind.annotation.*',
      ]),
      '',
      '@RestController',
      `@RequestMapping("/api/${routeFor(entity)}")`,
      `class ${name}Controller(private val service: ${name}Service) {`,
      '',
      '    @GetMapping',
      `    fun findAll(): List<${name}DTO> = service.findAll()`,
      '',
      '    @GetMapping("/{id}")',
      `    fun findById(@PathVariable id: Long): ${name}DTO = service.findById(id)`,
      '',
      '    @PostMapping',
      '    @ResponseStatus(HttpStatus.CREATED)',
      `    fun create(@Valid @RequestBody dto: ${name}DTO): ${name}DTO = service.create(dto)`,
      '',
      '    @PutMapping("/{id}")',
      `    fun update(@PathVariable id: Long, @Valid @RequestBody dto: ${name}DTO): ${name}DTO = service.update(id, dto)`,
      '',
      '    @DeleteMapping("/{id}")',
      '    @ResponseStatus(HttpStatus.NO_CONTENT)',
      '    fun delete(@PathVariable id: Long) = service.delete(id)',
      '}',
    ]
    return [file(MAIN, pkg, `${name}Controller`, lines)]
  }

  protected test(bp: EntityBlueprint): RenderedFile[] {
    const { entity } = bp
    const name = entity.entityName
    const pkg = `${modulePackage(bp)}.application.service`
    const lines = [
      `package ${pkg}`,
      '',
      ...kotlinImports([
        `${entityPackage(bp.namespace, entity)}.${name}`,
        `${modulePackage(bp)}.infrastructure.repository.${name}Repository`,
        'io.mockk.every',
        'io.mockk.mockk',
        'io.mockk.verify',
        'jakarta.persistence.EntityNotFoundException',
        'java.util.Optional',
        'org.junit.jupiter.api.Test',
        'org.junit.jupiter.api.assertThrows',
      ]),
      '',
      `class ${name}ServiceTest {`,
      `    private val repository = mockk<${name}Repository>(relaxed = true)`,
      `    private val service = ${name}Service(repository)`,
      '',
      '    @Test',
      '    fun `findById throws when missing`() {',
      '        every { repository.findById(1L) } returns Optional.empty()',
      '        assertThrows<EntityNotFoundException> { service.findById(1L) }',
      '    }',
      '',
      '    @Test',
      '    fun `delete deactivates entity`() {',
      `        val ${entity.variableName} = ${name}()`,
      `        every { repository.findById(2L) } returns Optional.of(${entity.variableName})`,
      '        service.delete(2L)',
      `        verify { repository.save(${entity.variableName}) }`,
      '    }',
      '}',
    ]
    return [file(TEST, pkg, `${name}ServiceTest`, lines)]
  }
}
