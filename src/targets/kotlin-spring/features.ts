/**
 * Spring Boot (Kotlin) feature packs
 *
 * Same packages, endpoints and mail templates as the Java packs.
 */

import { definePack } from '../../features/feature-pack.js'
import type { FeatureOptions, FeaturePackSet, StorageBackend } from '../../features/feature-pack.js'
import { importBlock, mailTemplates, packagePath } from '../jvm.js'
import { joinLines } from '../renderer.js'

const MAIN = 'src/main/kotlin'
const RESOURCES = 'src/main/resources'

function kotlinFile(files: Map<string, string>, options: FeatureOptions, subpackage: string, name: string, imports: string[], body: string[]): void {
  const pkg = `${options.namespace}.${subpackage}`
  const lines = [`package ${pkg}`, '']
  if (imports.length > 0) lines.push(...importBlock(imports, ''), '')
  lines.push(...body)
  files.set(`${MAIN}/${packagePath(pkg)}/${name}.kt`, joinLines(lines))
}

// ============================================================================
// Social login
// ============================================================================

function socialLogin(options: FeatureOptions): Map<string, string> {
  const files = new Map<string, string>()
  const pkg = 'security.social'

  kotlinFile(files, options, pkg, 'SocialAccount', [
    'jakarta.persistence.Column',
    'jakarta.persistence.Entity',
    'jakarta.persistence.Table',
    'jakarta.persistence.UniqueConstraint',
    `${options.namespace}.common.domain.BaseEntity`,
  ], [
    '@Entity',
    '@Table(name = "social_accounts", uniqueConstraints = [UniqueConstraint(columnNames = ["provider", "provider_id"])])',
    'class SocialAccount(',
    '    @Column(nullable = false)',
    '    var provider: String = "",',
    '',
    '    @Column(name = "provider_id", nullable = false)',
    '    var providerId: String = "",',
    '',
    '    var email: String? = null,',
    ') : BaseEntity()',
  ])

  kotlinFile(files, options, pkg, 'SocialAccountRepository', ['org.springframework.data.jpa.repository.JpaRepository'], [
    'interface SocialAccountRepository : JpaRepository<SocialAccount, Long> {',
    '',
    '    fun findByProviderAndProviderId(provider: String, providerId: String): SocialAccount?',
    '}',
  ])

  kotlinFile(files, options, pkg, 'SocialUserService', [
    'org.springframework.security.oauth2.client.userinfo.DefaultOAuth2UserService',
    'org.springframework.security.oauth2.client.userinfo.OAuth2UserRequest',
    'org.springframework.security.oauth2.core.user.OAuth2User',
    'org.springframework.stereotype.Service',
    'org.springframework.transaction.annotation.Transactional',
  ], [
    '@Service',
    'class SocialUserService(private val accounts: SocialAccountRepository) : DefaultOAuth2UserService() {',
    '',
    '    @Transactional',
    '    override fun loadUser(request: OAuth2UserRequest): OAuth2User {',
    '        val user = super.loadUser(request)',
    '        val provider = request.clientRegistration.registrationId',
    '        accounts.findByProviderAndProviderId(provider, user.name)',
    '            ?: accounts.save(SocialAccount(provider, user.name, user.getAttribute<String>("email")))',
    '        return user',
    '    }',
    '}',
  ])

  kotlinFile(files, options, pkg, 'OAuth2SecurityConfig', [
    'org.springframework.context.annotation.Bean',
    'org.springframework.context.annotation.Configuration',
    'org.springframework.security.config.annotation.web.builders.HttpSecurity',
    'org.springframework.security.web.SecurityFilterChain',
  ], [
    '@Configuration',
    'class OAuth2SecurityConfig {',
    '',
    '    @Bean',
    '    fun oauth2FilterChain(http: HttpSecurity, users: SocialUserService): SecurityFilterChain {',
    '        http.authorizeHttpRequests { it.requestMatchers("/oauth2/**", "/login/**").permitAll().anyRequest().authenticated() }',
    '            .oauth2Login { login -> login.userInfoEndpoint { it.userService(users) } }',
    '        return http.build()',
    '    }',
    '}',
  ])

  const properties = options.socialProviders.flatMap((provider) => {
    const env = provider.toUpperCase()
    return [
      `spring.security.oauth2.client.registration.${provider}.client-id=\${${env}_CLIENT_ID}`,
      `spring.security.oauth2.client.registration.${provider}.client-secret=\${${env}_CLIENT_SECRET}`,
      `spring.security.oauth2.client.registration.${provider}.scope=openid,email,profile`,
    ]
  })
  files.set(`${RESOURCES}/application-oauth2.properties`, joinLines(properties))
  return files
}

// ============================================================================
// Mail
// ============================================================================

function mail(options: FeatureOptions): Map<string, string> {
  const files = new Map<string, string>()
  const pkg = 'common.mail'
  const appName = options.projectName.replace(/[\\"$]/g, (char) => `\\${char}`)

  kotlinFile(files, options, pkg, 'EmailMessage', [], [
    'data class EmailMessage(val to: String, val subject: String, val template: String, val variables: Map<String, Any>)',
  ])

  kotlinFile(files, options, pkg, 'MailService', [
    'jakarta.mail.MessagingException',
    'org.slf4j.LoggerFactory',
    'org.springframework.mail.javamail.JavaMailSender',
    'org.springframework.mail.javamail.MimeMessageHelper',
    'org.springframework.scheduling.annotation.Async',
    'org.springframework.stereotype.Service',
    'org.thymeleaf.TemplateEngine',
    'org.thymeleaf.context.Context',
  ], [
    '@Service',
    'class MailService(private val sender: JavaMailSender, private val templates: TemplateEngine) {',
    '',
    '    private val log = LoggerFactory.getLogger(MailService::class.java)',
    '',
    '    @Async',
    '    fun send(message: EmailMessage) {',
    '        val html = templates.process("email/${message.template}", Context().apply { setVariables(message.variables) })',
    '        try {',
    '            val mime = sender.createMimeMessage()',
    '            MimeMessageHelper(mime, "UTF-8").apply {',
    '                setTo(message.to)',
    '                setSubject(message.subject)',
    '                setText(html, true)',
    '            }',
    '            sender.send(mime)',
    '        } catch (e: MessagingException) {',
    '            log.error("Failed to send {} to {}", message.template, message.to, e)',
    '        }',
    '    }',
    '',
    '    fun sendWelcome(to: String, name: String) =',
    `        send(EmailMessage(to, "Welcome to ${appName}", "welcome", mapOf("name" to name, "appName" to "${appName}")))`,
    '',
    '    fun sendPasswordReset(to: String, resetUrl: String, minutes: Int) =',
    '        send(EmailMessage(to, "Password reset", "password-reset", mapOf("resetUrl" to resetUrl, "minutes" to minutes)))',
    '',
    '    fun sendNotification(to: String, title: String, message: String) =',
    '        send(EmailMessage(to, title, "notification", mapOf("title" to title, "message" to message)))',
    '}',
  ])

  for (const [path, content] of mailTemplates(RESOURCES)) files.set(path, content)
  return files
}

// ============================================================================
// File storage
// ============================================================================

const STORAGE_IMPL: Record<StorageBackend, { className: string; imports: string[]; body: string[] }> = {
  local: {
    className: 'LocalFileStorageService',
    imports: ['java.nio.file.Files', 'java.nio.file.Path', 'org.springframework.beans.factory.annotation.Value'],
    body: [
      'class LocalFileStorageService(@Value("\\${storage.local.root:uploads}") rootDir: String) : FileStorageService {',
      '',
      '    private val root: Path = Path.of(rootDir)',
      '',
      '    override fun put(key: String, data: ByteArray): String {',
      '        Files.createDirectories(root)',
      '        Files.write(root.resolve(key), data)',
      '        return key',
      '    }',
      '',
      '    override fun get(key: String): ByteArray = Files.readAllBytes(root.resolve(key))',
      '',
      '    override fun delete(key: String) {',
      '        Files.deleteIfExists(root.resolve(key))',
      '    }',
      '}',
    ],
  },
  s3: {
    className: 'S3FileStorageService',
    imports: [
      'org.springframework.beans.factory.annotation.Value',
      'software.amazon.awssdk.core.sync.RequestBody',
      'software.amazon.awssdk.services.s3.S3Client',
    ],
    body: [
      'class S3FileStorageService(@Value("\\${storage.s3.bucket}") private val bucket: String) : FileStorageService {',
      '',
      '    private val client: S3Client = S3Client.create()',
      '',
      '    override fun put(key: String, data: ByteArray): String {',
      '        client.putObject({ it.bucket(bucket).key(key) }, RequestBody.fromBytes(data))',
      '        return key',
      '    }',
      '',
      '    override fun get(key: String): ByteArray = client.getObjectAsBytes { it.bucket(bucket).key(key) }.asByteArray()',
      '',
      '    override fun delete(key: String) {',
      '        client.deleteObject { it.bucket(bucket).key(key) }',
      '    }',
      '}',
    ],
  },
  azure: {
    className: 'AzureBlobStorageService',
    imports: [
      'com.azure.core.util.BinaryData',
      'com.azure.storage.blob.BlobContainerClient',
      'com.azure.storage.blob.BlobContainerClientBuilder',
      'org.springframework.beans.factory.annotation.Value',
    ],
    body: [
      'class AzureBlobStorageService(',
      '    @Value("\\${storage.azure.connection-string}") connectionString: String,',
      '    @Value("\\${storage.azure.container:uploads}") containerName: String,',
      ') : FileStorageService {',
      '',
      '    private val container: BlobContainerClient =',
      '        BlobContainerClientBuilder().connectionString(connectionString).containerName(containerName).buildClient()',
      '',
      '    override fun put(key: String, data: ByteArray): String {',
      '        container.getBlobClient(key).upload(BinaryData.fromBytes(data), true)',
      '        return key',
      '    }',
      '',
      '    override fun get(key: String): ByteArray = container.getBlobClient(key).downloadContent().toBytes()',
      '',
      '    override fun delete(key: String) {',
      '        container.getBlobClient(key).deleteIfExists()',
      '    }',
      '}',
    ],
  },
}

function fileStorage(options: FeatureOptions): Map<string, string> {
  const files = new Map<string, string>()
  const pkg = 'storage'
  const impl = STORAGE_IMPL[options.storageBackend]

  kotlinFile(files, options, pkg, 'FileStorageService', [], [
    'interface FileStorageService {',
    '',
    '    fun put(key: String, data: ByteArray): String',
    '',
    '    fun get(key: String): ByteArray',
    '',
    '    fun delete(key: String)',
    '}',
  ])

  kotlinFile(files, options, pkg, impl.className, ['org.springframework.stereotype.Service', ...impl.imports], ['@Service', ...impl.body])

  kotlinFile(files, options, pkg, 'FileController', [
    'java.util.UUID',
    'org.springframework.http.HttpStatus',
    'org.springframework.http.ResponseEntity',
    'org.springframework.web.bind.annotation.*',
    'org.springframework.web.multipart.MultipartFile',
  ], [
    '@RestController',
    '@RequestMapping("/api/files")',
    'class FileController(private val storage: FileStorageService) {',
    '',
    '    @PostMapping',
    '    fun upload(@RequestParam("file") file: MultipartFile): ResponseEntity<String> {',
    '        val key = "${UUID.randomUUID()}-${file.originalFilename}"',
    '        return ResponseEntity.status(HttpStatus.CREATED).body(storage.put(key, file.bytes))',
    '    }',
    '',
    '    @GetMapping("/{key}")',
    '    fun download(@PathVariable key: String): ByteArray = storage.get(key)',
    '',
    '    @DeleteMapping("/{key}")',
    '    @ResponseStatus(HttpStatus.NO_CONTENT)',
    '    fun delete(@PathVariable key: String) = storage.delete(key)',
    '}',
  ])
  return files
}

// ============================================================================
// Password reset
// ============================================================================

function passwordReset(options: FeatureOptions): Map<string, string> {
  const files = new Map<string, string>()
  const pkg = 'security.reset'

  kotlinFile(files, options, pkg, 'PasswordResetToken', [
    'jakarta.persistence.Column',
    'jakarta.persistence.Entity',
    'jakarta.persistence.Table',
    'java.time.Instant',
    `${options.namespace}.common.domain.BaseEntity`,
  ], [
    '@Entity',
    '@Table(name = "password_reset_tokens")',
    'class PasswordResetToken(',
    '    @Column(nullable = false, unique = true)',
    '    var token: String = "",',
    '',
    '    @Column(nullable = false)',
    '    var email: String = "",',
    '',
    '    @Column(name = "expires_at", nullable = false)',
    '    var expiresAt: Instant = Instant.EPOCH,',
    '',
    '    var used: Boolean = false,',
    ') : BaseEntity() {',
    '',
    '    fun isUsable(now: Instant): Boolean = !used && expiresAt.isAfter(now)',
    '}',
  ])

  kotlinFile(files, options, pkg, 'PasswordResetTokenRepository', ['org.springframework.data.jpa.repository.JpaRepository'], [
    'interface PasswordResetTokenRepository : JpaRepository<PasswordResetToken, Long> {',
    '',
    '    fun findByToken(token: String): PasswordResetToken?',
    '}',
  ])

  kotlinFile(files, options, pkg, 'PasswordResetService', [
    'java.security.SecureRandom',
    'java.time.Duration',
    'java.time.Instant',
    'java.util.HexFormat',
    'org.springframework.stereotype.Service',
    'org.springframework.transaction.annotation.Transactional',
  ], [
    '@Service',
    'class PasswordResetService(private val tokens: PasswordResetTokenRepository) {',
    '',
    '    private val random = SecureRandom()',
    '',
    '    @Transactional',
    '    fun request(email: String): String {',
    '        val bytes = ByteArray(32).also(random::nextBytes)',
    '        val token = HexFormat.of().formatHex(bytes)',
    '        tokens.save(PasswordResetToken(token, email, Instant.now().plus(TOKEN_LIFETIME)))',
    '        return token',
    '    }',
    '',
    '    @Transactional',
    '    fun consume(token: String): String {',
    '        val entry = tokens.findByToken(token)?.takeIf { it.isUsable(Instant.now()) }',
    '            ?: throw IllegalArgumentException("Invalid or expired token")',
    '        entry.used = true',
    '        return entry.email',
    '    }',
    '',
    '    companion object {',
    `        val TOKEN_LIFETIME: Duration = Duration.ofMinutes(${options.resetTokenMinutes})`,
    '    }',
    '}',
  ])

  kotlinFile(files, options, pkg, 'PasswordResetController', [
    'org.springframework.http.HttpStatus',
    'org.springframework.web.bind.annotation.*',
  ], [
    '@RestController',
    '@RequestMapping("/api/auth/password")',
    'class PasswordResetController(private val resets: PasswordResetService) {',
    '',
    '    data class ForgotPasswordRequest(val email: String)',
    '',
    '    data class ResetPasswordRequest(val token: String, val password: String)',
    '',
    '    @PostMapping("/forgot")',
    '    @ResponseStatus(HttpStatus.ACCEPTED)',
    '    fun forgot(@RequestBody request: ForgotPasswordRequest) {',
    '        resets.request(request.email)',
    '    }',
    '',
    '    @PostMapping("/reset")',
    '    @ResponseStatus(HttpStatus.NO_CONTENT)',
    '    fun reset(@RequestBody request: ResetPasswordRequest) {',
    '        resets.consume(request.token)',
    '    }',
    '}',
  ])
  return files
}

export const kotlinFeatures: FeaturePackSet = {
  'social-login': definePack('social-login', socialLogin),
  mail: definePack('mail', mail),
  'file-storage': definePack('file-storage', fileStorage),
  'password-reset': definePack('password-reset', passwordReset),
}
