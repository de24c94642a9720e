/**
 * Feature Pack Assembler Tests
 */

import { describe, it, expect } from 'vitest'
import { DiagnosticCollector } from '../../src/core/diagnostics.js'
import { definePack } from '../../src/features/feature-pack.js'
import type { FeatureOptions } from '../../src/features/feature-pack.js'
import { FeaturePackAssembler, mergeFiles } from '../../src/features/feature-pack-assembler.js'
import { ginFeatures } from '../../src/targets/go-gin/features.js'
import { kotlinFeatures } from '../../src/targets/kotlin-spring/features.js'
import { axumFeatures } from '../../src/targets/rust-axum/features.js'
import { nestFeatures } from '../../src/targets/typescript-nestjs/features.js'

const OPTIONS: FeatureOptions = {
  namespace: 'com.example.shop',
  projectName: 'shop',
  socialProviders: ['google', 'github'],
  storageBackend: 's3',
  resetTokenMinutes: 45,
}

describe('mergeFiles', () => {
  it('adds new paths silently', () => {
    const target = new Map([['a.ts', 'a']])
    const diagnostics = new DiagnosticCollector()

    mergeFiles(target, new Map([['b.ts', 'b']]), diagnostics, 'Pack')

    expect([...target.keys()]).toEqual(['a.ts', 'b.ts'])
    expect(diagnostics.size).toBe(0)
  })

  it('lets the later file win and reports the collision', () => {
    const target = new Map([['a.ts', 'first']])
    const diagnostics = new DiagnosticCollector()

    mergeFiles(target, new Map([['a.ts', 'second']]), diagnostics, "Feature 'mail'")

    expect(target.get('a.ts')).toBe('second')
    expect(diagnostics.list()).toEqual([
      {
        code: 'path-collision',
        severity: 'warning',
        message: "Feature 'mail' overwrote a previously generated file",
        path: 'a.ts',
      },
    ])
  })
})

describe('FeaturePackAssembler', () => {
  const assembler = new FeaturePackAssembler(nestFeatures, 'TypeScript / NestJS')

  it('renders nothing when no pack is requested', () => {
    const diagnostics = new DiagnosticCollector()
    expect(assembler.assemble([], OPTIONS, diagnostics).size).toBe(0)
    expect(diagnostics.size).toBe(0)
  })

  it('renders one strategy per social provider', () => {
    const files = assembler.assemble(['social-login'], OPTIONS, new DiagnosticCollector())

    expect([...files.keys()]).toEqual([
      'src/auth/social/social-account.entity.ts',
      'src/auth/social/social-auth.service.ts',
      'src/auth/social/strategies/google.strategy.ts',
      'src/auth/social/strategies/github.strategy.ts',
      'src/auth/social/social-auth.controller.ts',
      'src/auth/social/social-auth.module.ts',
    ])
    expect(files.get('src/auth/social/social-auth.module.ts')).toContain(
      '  providers: [SocialAuthService, GoogleStrategy, GithubStrategy],',
    )
  })

  it('renders the configured storage backend', () => {
    const files = assembler.assemble(['file-storage'], OPTIONS, new DiagnosticCollector())

    expect(files.has('src/files/storage/s3-file-storage.ts')).toBe(true)
    expect(files.has('src/files/storage/local-file-storage.ts')).toBe(false)
    expect(files.get('src/files/files.module.ts')).toContain(
      '  providers: [{ provide: FILE_STORAGE, useClass: S3FileStorage }],',
    )
  })

  it('bakes the token lifetime into the password reset service', () => {
    const files = assembler.assemble(['password-reset'], OPTIONS, new DiagnosticCollector())
    const service = files.get('src/auth/password-reset/password-reset.service.ts') ?? ''

    expect(service.split('\n')).toContain('export const RESET_TOKEN_MINUTES = 45')
  })

  it('renders the mail templates', () => {
    const files = assembler.assemble(['mail'], OPTIONS, new DiagnosticCollector())

    expect([...files.keys()].filter((path) => path.endsWith('.hbs'))).toEqual([
      'src/mail/templates/welcome.hbs',
      'src/mail/templates/password-reset.hbs',
      'src/mail/templates/notification.hbs',
    ])
  })

  it('processes packs in canonical order regardless of request order', () => {
    const files = assembler.assemble(['password-reset', 'mail'], OPTIONS, new DiagnosticCollector())
    const paths = [...files.keys()]

    expect(paths[0]).toBe('src/mail/mail.service.ts')
    expect(paths.at(-1)).toBe('src/auth/password-reset/password-reset.module.ts')
  })

  it('reports a pack the target does not carry', () => {
    const diagnostics = new DiagnosticCollector()
    const files = new FeaturePackAssembler({}, 'Go / Gin').assemble(['mail'], OPTIONS, diagnostics)

    expect(files.size).toBe(0)
    expect(diagnostics.list()).toEqual([
      { code: 'unsupported-feature', severity: 'warning', message: "Feature 'mail' is not available for Go / Gin" },
    ])
  })

  it('reports a path written by two packs', () => {
    const shared = () => new Map([['config/app.yml', 'x']])
    const diagnostics = new DiagnosticCollector()
    const packs = { mail: definePack('mail', shared), 'file-storage': definePack('file-storage', shared) }

    new FeaturePackAssembler(packs, 'Custom').assemble(['mail', 'file-storage'], OPTIONS, diagnostics)

    expect(diagnostics.list().map((d) => [d.code, d.path, d.message])).toEqual([
      ['path-collision', 'config/app.yml', "Feature 'file-storage' overwrote a previously generated file"],
    ])
  })

  it('knows which packs it supports', () => {
    expect(assembler.supports('mail')).toBe(true)
    expect(new FeaturePackAssembler({}, 'Go / Gin').supports('mail')).toBe(false)
  })
})

describe('Kotlin packs', () => {
  const assembler = new FeaturePackAssembler(kotlinFeatures, 'Kotlin / Spring Boot')
  const root = 'src/main/kotlin/com/example/shop'

  it('renders the configured storage backend with escaped property placeholders', () => {
    const files = assembler.assemble(['file-storage'], OPTIONS, new DiagnosticCollector())

    expect([...files.keys()]).toEqual([
      `${root}/storage/FileStorageService.kt`,
      `${root}/storage/S3FileStorageService.kt`,
      `${root}/storage/FileController.kt`,
    ])
    expect(files.get(`${root}/storage/S3FileStorageService.kt`)?.split('\n')).toContain(
      'class S3FileStorageService(@Value("\\${storage.s3.bucket}") private val bucket: String) : FileStorageService {',
    )
  })

  it('bakes the token lifetime into the password reset service', () => {
    const files = assembler.assemble(['password-reset'], OPTIONS, new DiagnosticCollector())

    expect(files.get(`${root}/security/reset/PasswordResetService.kt`)?.split('\n')).toContain(
      '        val TOKEN_LIFETIME: Duration = Duration.ofMinutes(45)',
    )
  })

  it('shares the Thymeleaf templates with the Java pack', () => {
    const files = assembler.assemble(['mail'], OPTIONS, new DiagnosticCollector())

    expect([...files.keys()].filter((path) => path.endsWith('.html'))).toEqual([
      'src/main/resources/templates/email/welcome.html',
      'src/main/resources/templates/email/password-reset.html',
      'src/main/resources/templates/email/notification.html',
    ])
    expect(files.get(`${root}/common/mail/MailService.kt`)?.split('\n')).toContain(
      '        send(EmailMessage(to, "Welcome to shop", "welcome", mapOf("name" to name, "appName" to "shop")))',
    )
  })

  it('writes one OAuth registration per provider', () => {
    const files = assembler.assemble(['social-login'], OPTIONS, new DiagnosticCollector())
    const properties = files.get('src/main/resources/application-oauth2.properties')?.split('\n') ?? []

    expect(properties).toContain('spring.security.oauth2.client.registration.google.client-id=${GOOGLE_CLIENT_ID}')
    expect(properties).toContain('spring.security.oauth2.client.registration.github.client-secret=${GITHUB_CLIENT_SECRET}')
  })
})

describe('Gin packs', () => {
  const assembler = new FeaturePackAssembler(ginFeatures, 'Go / Gin')

  it('renders the storage interface, the configured backend and the handler', () => {
    const files = assembler.assemble(['file-storage'], OPTIONS, new DiagnosticCollector())

    expect([...files.keys()]).toEqual([
      'internal/storage/storage.go',
      'internal/storage/s3_storage.go',
      'internal/storage/handler.go',
    ])
    expect(files.get('internal/storage/s3_storage.go')?.split('\n').slice(0, 12)).toEqual([
      'package storage',
      '',
      'import (',
      '\t"bytes"',
      '\t"context"',
      '\t"io"',
      '\t"os"',
      '',
      '\t"github.com/aws/aws-sdk-go-v2/aws"',
      '\t"github.com/aws/aws-sdk-go-v2/config"',
      '\t"github.com/aws/aws-sdk-go-v2/service/s3"',
      ')',
    ])
  })

  it('embeds the mail templates beside the sender', () => {
    const files = assembler.assemble(['mail'], OPTIONS, new DiagnosticCollector())

    expect([...files.keys()]).toEqual([
      'internal/mail/mail.go',
      'internal/mail/templates/welcome.html',
      'internal/mail/templates/password_reset.html',
      'internal/mail/templates/notification.html',
    ])
    expect(files.get('internal/mail/mail.go')?.split('\n')).toContain('const appName = "shop"')
  })

  it('bakes the token lifetime into the reset package', () => {
    const files = assembler.assemble(['password-reset'], OPTIONS, new DiagnosticCollector())

    expect(files.get('internal/auth/reset/reset.go')?.split('\n')).toContain('const TokenLifetime = 45 * time.Minute')
  })
})

describe('Axum packs', () => {
  const assembler = new FeaturePackAssembler(axumFeatures, 'Rust / Axum')

  it('builds the object store for the configured backend', () => {
    const files = assembler.assemble(['file-storage'], OPTIONS, new DiagnosticCollector())

    expect(files.get('src/storage.rs')?.split('\n')).toContain(
      '    Ok(Arc::new(object_store::aws::AmazonS3Builder::from_env().with_bucket_name(std::env::var("STORAGE_BUCKET")?).build()?))',
    )
  })

  it('maps each provider to its environment prefix', () => {
    const files = assembler.assemble(['social-login'], OPTIONS, new DiagnosticCollector())
    const lines = files.get('src/social.rs')?.split('\n') ?? []

    expect(lines).toContain('        "google" => Some("GOOGLE"),')
    expect(lines).toContain('        "github" => Some("GITHUB"),')
  })

  it('writes the reset module with its migration', () => {
    const files = assembler.assemble(['password-reset'], OPTIONS, new DiagnosticCollector())

    expect([...files.keys()]).toEqual(['src/password_reset.rs', 'migrations/password_reset_tokens.sql'])
    expect(files.get('src/password_reset.rs')?.split('\n')).toContain('pub const TOKEN_LIFETIME_MINUTES: i64 = 45;')
  })

  it('renders the Tera mail templates', () => {
    const files = assembler.assemble(['mail'], OPTIONS, new DiagnosticCollector())

    expect([...files.keys()]).toEqual([
      'src/mail.rs',
      'templates/email/welcome.html',
      'templates/email/password_reset.html',
      'templates/email/notification.html',
    ])
  })
})
