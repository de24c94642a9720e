/**
 * Helpers shared by the Java and Kotlin renderers
 */

import type { EntityRef } from '../generators/blueprint.js'
import { joinLines } from './renderer.js'

export function packagePath(namespace: string): string {
  return namespace.replace(/\./g, '/')
}

export function entityPackage(namespace: string, entity: EntityRef): string {
  return `${namespace}.${entity.moduleName}.domain.entity`
}

/**
 * Sorted, de-duplicated import lines; `java.lang`-style implicit imports and
 * same-package imports are dropped by the caller
 */
export function importBlock(imports: Iterable<string>, terminator = ';'): string[] {
  return [...new Set(imports)].sort().map((entry) => `import ${entry}${terminator}`)
}

/**
 * Route segment for a table: `order_items` → `order-items`
 */
export function routeFor(entity: EntityRef): string {
  return entity.tableName.toLowerCase().replace(/_/g, '-')
}

const MAIL_TEMPLATES: Record<string, string[]> = {
  welcome: ['<h1 th:text="|Welcome, ${name}|">Welcome</h1>', '<p th:text="|Your ${appName} account is ready.|"></p>'],
  'password-reset': [
    '<h1>Reset your password</h1>',
    '<p>Follow <a th:href="${resetUrl}">this link</a> within <span th:text="${minutes}"></span> minutes.</p>',
  ],
  notification: ['<h1 th:text="${title}"></h1>', '<p th:text="${message}"></p>'],
}

/**
 * Thymeleaf mail templates under `<resources>/templates/email`
 */
export function mailTemplates(resources: string): Map<string, string> {
  const files = new Map<string, string>()
  for (const [name, body] of Object.entries(MAIL_TEMPLATES)) {
    files.set(
      `${resources}/templates/email/${name}.html`,
      joinLines(['<!DOCTYPE html>', '<html xmlns:th="http://www.thymeleaf.org">', '<body>', ...body, '</body>', '</html>']),
    )
  }
  return files
}
