/**
 * NestJS feature packs
 *
 * passport strategies for social login, nodemailer-backed mail with
 * handlebars templates, pluggable file storage and token-based password reset.
 */

import { capitalize } from '../../core/naming.js'
import { definePack } from '../../features/feature-pack.js'
import type { FeatureOptions, FeaturePackSet, StorageBackend } from '../../features/feature-pack.js'
import { joinLines } from '../renderer.js'

const PASSPORT_STRATEGY: Record<string, string> = {
  google: 'passport-google-oauth20',
  github: 'passport-github2',
  facebook: 'passport-facebook',
}

function strategyFile(provider: string): string[] {
  const name = capitalize(provider)
  const env = provider.toUpperCase()
  return [
    `import { Injectable } from '@nestjs/common'`,
    `import { PassportStrategy } from '@nestjs/passport'`,
    `import { Strategy } from '${PASSPORT_STRATEGY[provider] ?? `passport-${provider}`}'`,
    `import { SocialAuthService } from '../social-auth.service'`,
    '',
    '@Injectable()',
    `export class ${name}Strategy extends PassportStrategy(Strategy, '${provider}') {`,
    '  constructor(private readonly socialAuth: SocialAuthService) {',
    '    super({',
    `      clientID: process.env.${env}_CLIENT_ID,`,
    `      clientSecret: process.env.${env}_CLIENT_SECRET,`,
    `      callbackURL: process.env.${env}_CALLBACK_URL,`,
    `      scope: ['email', 'profile'],`,
    '    })',
    '  }',
    '',
    '  async validate(_accessToken: string, _refreshToken: string, profile: { id: string; emails?: { value: string }[] }) {',
    `    return this.socialAuth.upsert('${provider}', profile.id, profile.emails?.[0]?.value ?? null)`,
    '  }',
    '}',
  ]
}

function socialLogin(options: FeatureOptions): Map<string, string> {
  const files = new Map<string, string>()
  const dir = 'src/auth/social'

  files.set(
    `${dir}/social-account.entity.ts`,
    joinLines([
      `import { Column, Entity, Index } from 'typeorm'`,
      `import { BaseEntity } from '../../common/entities/base.entity'`,
      '',
      `@Entity('social_accounts')`,
      `@Index(['provider', 'providerId'], { unique: true })`,
      'export class SocialAccount extends BaseEntity {',
      '  @Column()',
      '  provider!: string',
      '',
      `  @Column({ name: 'provider_id' })`,
      '  providerId!: string',
      '',
      '  @Column({ type: \'varchar\', nullable: true })',
      '  email!: string | null',
      '}',
    ]),
  )

  files.set(
    `${dir}/social-auth.service.ts`,
    joinLines([
      `import { Injectable } from '@nestjs/common'`,
      `import { InjectRepository } from '@nestjs/typeorm'`,
      `import { Repository } from 'typeorm'`,
      `import { SocialAccount } from './social-account.entity'`,
      '',
      '@Injectable()',
      'export class SocialAuthService {',
      '  constructor(@InjectRepository(SocialAccount) private readonly accounts: Repository<SocialAccount>) {}',
      '',
      '  async upsert(provider: string, providerId: string, email: string | null): Promise<SocialAccount> {',
      '    const existing = await this.accounts.findOneBy({ provider, providerId })',
      '    if (existing) return existing',
      '    return this.accounts.save(this.accounts.create({ provider, providerId, email }))',
      '  }',
      '}',
    ]),
  )

  const strategies = options.socialProviders.map((provider) => `${capitalize(provider)}Strategy`)
  for (const provider of options.socialProviders) {
    files.set(`${dir}/strategies/${provider}.strategy.ts`, joinLines(strategyFile(provider)))
  }

  const routes = options.socialProviders.flatMap((provider) => [
    '',
    `  @Get('${provider}')`,
    `  @UseGuards(AuthGuard('${provider}'))`,
    `  ${provider}(): void {}`,
    '',
    `  @Get('${provider}/callback')`,
    `  @UseGuards(AuthGuard('${provider}'))`,
    `  ${provider}Callback(@Req() req: { user: SocialAccount }): SocialAccount {`,
    '    return req.user',
    '  }',
  ])
  files.set(
    `${dir}/social-auth.controller.ts`,
    joinLines([
      `import { Controller, Get, Req, UseGuards } from '@nestjs/common'`,
      `import { AuthGuard } from '@nestjs/passport'`,
      `import { SocialAccount } from './social-account.entity'`,
      '',
      `@Controller('auth')`,
      'export class SocialAuthController {',
      ...routes.slice(1),
      '}',
    ]),
  )

  files.set(
    `${dir}/social-auth.module.ts`,
    joinLines([
      `import { Module } from '@nestjs/common'`,
      `import { PassportModule } from '@nestjs/passport'`,
      `import { TypeOrmModule } from '@nestjs/typeorm'`,
      `import { SocialAccount } from './social-account.entity'`,
      `import { SocialAuthController } from './social-auth.controller'`,
      `import { SocialAuthService } from './social-auth.service'`,
      ...options.socialProviders.map((provider) => `import { ${capitalize(provider)}Strategy } from './strategies/${provider}.strategy'`),
      '',
      '@Module({',
      '  imports: [PassportModule, TypeOrmModule.forFeature([SocialAccount])],',
      '  controllers: [SocialAuthController],',
      `  providers: [${['SocialAuthService', ...strategies].join(', ')}],`,
      '})',
      'export class SocialAuthModule {}',
    ]),
  )
  return files
}

const MAIL_TEMPLATES: Record<string, string[]> = {
  welcome: ['<h1>Welcome, {{name}}</h1>', '<p>Your {{appName}} account is ready.</p>'],
  'password-reset': [
    '<h1>Reset your password</h1>',
    '<p>Follow <a href="{{resetUrl}}">this link</a> within {{minutes}} minutes.</p>',
  ],
  notification: ['<h1>{{title}}</h1>', '<p>{{message}}</p>'],
}

function mail(options: FeatureOptions): Map<string, string> {
  const files = new Map<string, string>()
  files.set(
    'src/mail/mail.service.ts',
    joinLines([
      `import { Injectable, Logger } from '@nestjs/common'`,
      `import { MailerService } from '@nestjs-modules/mailer'`,
      '',
      'export interface EmailMessage {',
      '  to: string',
      '  subject: string',
      '  template: string',
      '  context: Record<string, unknown>',
      '}',
      '',
      '@Injectable()',
      'export class MailService {',
      '  private readonly logger = new Logger(MailService.name)',
      '',
      '  constructor(private readonly mailer: MailerService) {}',
      '',
      '  async send(message: EmailMessage): Promise<void> {',
      '    await this.mailer.sendMail(message)',
      '    this.logger.log(`Sent ${message.template} to ${message.to}`)',
      '  }',
      '',
      '  sendWelcome(to: string, name: string): Promise<void> {',
      `    return this.send({ to, subject: 'Welcome to ${options.projectName}', template: 'welcome', context: { name, appName: '${options.projectName}' } })`,
      '  }',
      '',
      '  sendPasswordReset(to: string, resetUrl: string, minutes: number): Promise<void> {',
      `    return this.send({ to, subject: 'Password reset', template: 'password-reset', context: { resetUrl, minutes } })`,
      '  }',
      '',
      '  sendNotification(to: string, title: string, message: string): Promise<void> {',
      `    return this.send({ to, subject: title, template: 'notification', context: { title, message } })`,
      '  }',
      '}',
    ]),
  )
  files.set(
    'src/mail/mail.module.ts',
    joinLines([
      `import { join } from 'node:path'`,
      `import { Global, Module } from '@nestjs/common'`,
      `import { MailerModule } from '@nestjs-modules/mailer'`,
      `import { HandlebarsAdapter } from '@nestjs-modules/mailer/dist/adapters/handlebars.adapter'`,
      `import { MailService } from './mail.service'`,
      '',
      '@Global()',
      '@Module({',
      '  imports: [',
      '    MailerModule.forRoot({',
      '      transport: process.env.SMTP_URL,',
      `      defaults: { from: process.env.MAIL_FROM },`,
      `      template: { dir: join(__dirname, 'templates'), adapter: new HandlebarsAdapter() },`,
      '    }),',
      '  ],',
      '  providers: [MailService],',
      '  exports: [MailService],',
      '})',
      'export class MailModule {}',
    ]),
  )
  for (const [name, body] of Object.entries(MAIL_TEMPLATES)) {
    files.set(`src/mail/templates/${name}.hbs`, joinLines(body))
  }
  return files
}

function storageImpl(backend: StorageBackend): string[] {
  switch (backend) {
    case 'local':
      return [
        `import { mkdir, readFile, rm, writeFile } from 'node:fs/promises'`,
        `import { join } from 'node:path'`,
        `import { Injectable } from '@nestjs/common'`,
        `import { FileStorage } from '../file-storage'`,
        '',
        '@Injectable()',
        'export class LocalFileStorage implements FileStorage {',
        `  private readonly root = process.env.STORAGE_DIR ?? 'uploads'`,
        '',
        '  async put(key: string, data: Buffer): Promise<string> {',
        '    await mkdir(this.root, { recursive: true })',
        '    await writeFile(join(this.root, key), data)',
        '    return key',
        '  }',
        '',
        '  get(key: string): Promise<Buffer> {',
        '    return readFile(join(this.root, key))',
        '  }',
        '',
        '  async delete(key: string): Promise<void> {',
        '    await rm(join(this.root, key), { force: true })',
        '  }',
        '}',
      ]
    case 's3':
      return [
        `import { DeleteObjectCommand, GetObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3'`,
        `import { Injectable } from '@nestjs/common'`,
        `import { FileStorage } from '../file-storage'`,
        '',
        '@Injectable()',
        'export class S3FileStorage implements FileStorage {',
        '  private readonly client = new S3Client({})',
        '  private readonly bucket = process.env.S3_BUCKET',
        '',
        '  async put(key: string, data: Buffer): Promise<string> {',
        '    await this.client.send(new PutObjectCommand({ Bucket: this.bucket, Key: key, Body: data }))',
        '    return key',
        '  }',
        '',
        '  async get(key: string): Promise<Buffer> {',
        '    const result = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }))',
        '    return Buffer.from((await result.Body?.transformToByteArray()) ?? [])',
        '  }',
        '',
        '  async delete(key: string): Promise<void> {',
        '    await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }))',
        '  }',
        '}',
      ]
    case 'azure':
      return [
        `import { BlobServiceClient } from '@azure/storage-blob'`,
        `import { Injectable } from '@nestjs/common'`,
        `import { FileStorage } from '../file-storage'`,
        '',
        '@Injectable()',
        'export class AzureFileStorage implements FileStorage {',
        '  private readonly container = BlobServiceClient.fromConnectionString(',
        `    process.env.AZURE_STORAGE_CONNECTION_STRING ?? '',`,
        `  ).getContainerClient(process.env.AZURE_STORAGE_CONTAINER ?? 'uploads')`,
        '',
        '  async put(key: string, data: Buffer): Promise<string> {',
        '    await this.container.getBlockBlobClient(key).uploadData(data)',
        '    return key',
        '  }',
        '',
        '  get(key: string): Promise<Buffer> {',
        '    return this.container.getBlockBlobClient(key).downloadToBuffer()',
        '  }',
        '',
        '  async delete(key: string): Promise<void> {',
        '    await this.container.getBlockBlobClient(key).deleteIfExists()',
        '  }',
        '}',
      ]
  }
}

const STORAGE_CLASS: Record<StorageBackend, string> = {
  local: 'LocalFileStorage',
  s3: 'S3FileStorage',
  azure: 'AzureFileStorage',
}

function fileStorage(options: FeatureOptions): Map<string, string> {
  const backend = options.storageBackend
  const implClass = STORAGE_CLASS[backend]
  const files = new Map<string, string>()

  files.set(
    'src/files/file-storage.ts',
    joinLines([
      'export interface FileStorage {',
      '  put(key: string, data: Buffer): Promise<string>',
      '  get(key: string): Promise<Buffer>',
      '  delete(key: string): Promise<void>',
      '}',
      '',
      `export const FILE_STORAGE = Symbol('FILE_STORAGE')`,
    ]),
  )
  files.set(`src/files/storage/${backend}-file-storage.ts`, joinLines(storageImpl(backend)))
  files.set(
    'src/files/files.controller.ts',
    joinLines([
      `import { randomUUID } from 'node:crypto'`,
      `import { Controller, Delete, Get, Inject, Param, Post, StreamableFile, UploadedFile, UseInterceptors } from '@nestjs/common'`,
      `import { FileInterceptor } from '@nestjs/platform-express'`,
      `import { FILE_STORAGE, FileStorage } from './file-storage'`,
      '',
      `@Controller('api/files')`,
      'export class FilesController {',
      '  constructor(@Inject(FILE_STORAGE) private readonly storage: FileStorage) {}',
      '',
      '  @Post()',
      `  @UseInterceptors(FileInterceptor('file'))`,
      '  async upload(@UploadedFile() file: Express.Multer.File): Promise<{ key: string }> {',
      '    const key = `${randomUUID()}-${file.originalname}`',
      '    return { key: await this.storage.put(key, file.buffer) }',
      '  }',
      '',
      `  @Get(':key')`,
      `  async download(@Param('key') key: string): Promise<StreamableFile> {`,
      '    return new StreamableFile(await this.storage.get(key))',
      '  }',
      '',
      `  @Delete(':key')`,
      `  remove(@Param('key') key: string): Promise<void> {`,
      '    return this.storage.delete(key)',
      '  }',
      '}',
    ]),
  )
  files.set(
    'src/files/files.module.ts',
    joinLines([
      `import { Module } from '@nestjs/common'`,
      `import { FILE_STORAGE } from './file-storage'`,
      `import { FilesController } from './files.controller'`,
      `import { ${implClass} } from './storage/${backend}-file-storage'`,
      '',
      '@Module({',
      '  controllers: [FilesController],',
      `  providers: [{ provide: FILE_STORAGE, useClass: ${implClass} }],`,
      '})',
      'export class FilesModule {}',
    ]),
  )
  return files
}

function passwordReset(options: FeatureOptions): Map<string, string> {
  const dir = 'src/auth/password-reset'
  const files = new Map<string, string>()
  files.set(
    `${dir}/password-reset-token.entity.ts`,
    joinLines([
      `import { Column, Entity } from 'typeorm'`,
      `import { BaseEntity } from '../../common/entities/base.entity'`,
      '',
      `@Entity('password_reset_tokens')`,
      'export class PasswordResetToken extends BaseEntity {',
      '  @Column({ unique: true })',
      '  token!: string',
      '',
      '  @Column()',
      '  email!: string',
      '',
      `  @Column({ name: 'expires_at' })`,
      '  expiresAt!: Date',
      '',
      `  @Column({ name: 'used', default: false })`,
      '  used!: boolean',
      '}',
    ]),
  )
  files.set(
    `${dir}/password-reset.service.ts`,
    joinLines([
      `import { randomBytes } from 'node:crypto'`,
      `import { BadRequestException, Injectable } from '@nestjs/common'`,
      `import { InjectRepository } from '@nestjs/typeorm'`,
      `import { Repository } from 'typeorm'`,
      `import { PasswordResetToken } from './password-reset-token.entity'`,
      '',
      `export const RESET_TOKEN_MINUTES = ${options.resetTokenMinutes}`,
      '',
      '@Injectable()',
      'export class PasswordResetService {',
      '  constructor(@InjectRepository(PasswordResetToken) private readonly tokens: Repository<PasswordResetToken>) {}',
      '',
      '  async request(email: string): Promise<string> {',
      `    const token = randomBytes(32).toString('hex')`,
      '    const expiresAt = new Date(Date.now() + RESET_TOKEN_MINUTES * 60_000)',
      '    await this.tokens.save(this.tokens.create({ token, email, expiresAt, used: false }))',
      '    return token',
      '  }',
      '',
      '  async consume(token: string): Promise<string> {',
      '    const entry = await this.tokens.findOneBy({ token, used: false })',
      `    if (!entry || entry.expiresAt.getTime() < Date.now()) throw new BadRequestException('Invalid or expired token')`,
      '    entry.used = true',
      '    await this.tokens.save(entry)',
      '    return entry.email',
      '  }',
      '}',
    ]),
  )
  files.set(
    `${dir}/password-reset.controller.ts`,
    joinLines([
      `import { Body, Controller, HttpCode, Post } from '@nestjs/common'`,
      `import { IsEmail, IsString, MinLength } from 'class-validator'`,
      `import { PasswordResetService } from './password-reset.service'`,
      '',
      'export class ForgotPasswordDto {',
      '  @IsEmail()',
      '  email!: string',
      '}',
      '',
      'export class ResetPasswordDto {',
      '  @IsString()',
      '  token!: string',
      '',
      '  @MinLength(8)',
      '  password!: string',
      '}',
      '',
      `@Controller('auth/password')`,
      'export class PasswordResetController {',
      '  constructor(private readonly resets: PasswordResetService) {}',
      '',
      `  @Post('forgot')`,
      '  @HttpCode(202)',
      '  async forgot(@Body() dto: ForgotPasswordDto): Promise<void> {',
      '    await this.resets.request(dto.email)',
      '  }',
      '',
      `  @Post('reset')`,
      '  @HttpCode(204)',
      '  async reset(@Body() dto: ResetPasswordDto): Promise<void> {',
      '    await this.resets.consume(dto.token)',
      '  }',
      '}',
    ]),
  )
  files.set(
    `${dir}/password-reset.module.ts`,
    joinLines([
      `import { Module } from '@nestjs/common'`,
      `import { TypeOrmModule } from '@nestjs/typeorm'`,
      `import { PasswordResetController } from './password-reset.controller'`,
      `import { PasswordResetToken } from './password-reset-token.entity'`,
      `import { PasswordResetService } from './password-reset.service'`,
      '',
      '@Module({',
      '  imports: [TypeOrmModule.forFeature([PasswordResetToken])],',
      '  controllers: [PasswordResetController],',
      '  providers: [PasswordResetService],',
      '})',
      'export class PasswordResetModule {}',
    ]),
  )
  return files
}

export const nestFeatures: FeaturePackSet = {
  'social-login': definePack('social-login', socialLogin),
  mail: definePack('mail', mail),
  'file-storage': definePack('file-storage', fileStorage),
  'password-reset': definePack('password-reset', passwordReset),
}
