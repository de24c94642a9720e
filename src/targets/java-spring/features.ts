/**
 * Spring Boot (Java) feature packs
 */

import { definePack } from '../../features/feature-pack.js'
import type { FeatureOptions, FeaturePackSet, StorageBackend } from '../../features/feature-pack.js'
import { importBlock, mailTemplates, packagePath } from '../jvm.js'
import { joinLines } from '../renderer.js'

const MAIN = 'src/main/java'
const RESOURCES = 'src/main/resources'

/**
 * Adds one Java source file under `<namespace>.<subpackage>`
 */
function javaFile(files: Map<string, string>, options: FeatureOptions, subpackage: string, className: string, imports: string[], body: string[]): void {
  const pkg = `${options.namespace}.${subpackage}`
  const lines = [`package ${pkg};`, '']
  if (imports.length > 0) lines.push(...importBlock(imports), '')
  lines.push(...body)
  files.set(`${MAIN}/${packagePath(pkg)}/${className}.java`, joinLines(lines))
}

// ============================================================================
// Social login
// ============================================================================

function socialLogin(options: FeatureOptions): Map<string, string> {
  const files = new Map<string, string>()
  const pkg = 'security.social'

  javaFile(files, options, pkg, 'SocialAccount', [
    'jakarta.persistence.Column',
    'jakarta.persistence.Entity',
    'jakarta.persistence.Table',
    'jakarta.persistence.UniqueConstraint',
    `${options.namespace}.common.domain.BaseEntity`,
  ], [
    '@Entity',
    '@Table(name = "social_accounts", uniqueConstraints = @UniqueConstraint(columnNames = {"provider", "provider_id"}))',
    'public class SocialAccount extends BaseEntity {',
    '',
    '    @Column(nullable = false)',
    '    private String provider;',
    '',
    '    @Column(name = "provider_id", nullable = false)',
    '    private String providerId;',
    '',
    '    private String email;',
    '',
    '    protected SocialAccount() {}',
    '',
    '    public SocialAccount(String provider, String providerId, String email) {',
    '        this.provider = provider;',
    '        this.providerId = providerId;',
    '        this.email = email;',
    '    }',
    '',
    '    public String getProvider() {',
    '        return provider;',
    '    }',
    '',
    '    public String getProviderId() {',
    '        return providerId;',
    '    }',
    '',
    '    public String getEmail() {',
    '        return email;',
    '    }',
    '}',
  ])

  javaFile(files, options, pkg, 'SocialAccountRepository', [
    'java.util.Optional',
    'org.springframework.data.jpa.repository.JpaRepository',
  ], [
    'public interface SocialAccountRepository extends JpaRepository<SocialAccount, Long> {',
    '',
    '    Optional<SocialAccount> findByProviderAndProviderId(String provider, String providerId);',
    '}',
  ])

  javaFile(files, options, pkg, 'SocialUserService', [
    'org.springframework.security.oauth2.client.userinfo.DefaultOAuth2UserService',
    'org.springframework.security.oauth2.client.userinfo.OAuth2UserRequest',
    'org.springframework.security.oauth2.core.user.OAuth2User',
    'org.springframework.stereotype.Service',
    'org.springframework.transaction.annotation.Transactional',
  ], [
    '@Service',
    'public class SocialUserService extends DefaultOAuth2UserService {',
    '',
    '    private final SocialAccountRepository accounts;',
    '',
    '    public SocialUserService(SocialAccountRepository accounts) {',
    '        this.accounts = accounts;',
    '    }',
    '',
    '    @Override',
    '    @Transactional',
    '    public OAuth2User loadUser(OAuth2UserRequest request) {',
    '        OAuth2User user = super.loadUser(request);',
    '        String provider = request.getClientRegistration().getRegistrationId();',
    '        String providerId = user.getName();',
    '        accounts.findByProviderAndProviderId(provider, providerId)',
    '                .orElseGet(() -> accounts.save(new SocialAccount(provider, providerId, user.getAttribute("email"))));',
    '        return user;',
    '    }',
    '}',
  ])

  javaFile(files, options, pkg, 'OAuth2SecurityConfig', [
    'org.springframework.context.annotation.Bean',
    'org.springframework.context.annotation.Configuration',
    'org.springframework.security.config.annotation.web.builders.HttpSecurity',
    'org.springframework.security.web.SecurityFilterChain',
  ], [
    '@Configuration',
    'public class OAuth2SecurityConfig {',
    '',
    '    @Bean',
    '    SecurityFilterChain oauth2FilterChain(HttpSecurity http, SocialUserService users) throws Exception {',
    '        http.authorizeHttpRequests(auth -> auth',
    '                        .requestMatchers("/oauth2/**", "/login/**").permitAll()',
    '                        .anyRequest().authenticated())',
    '                .oauth2Login(login -> login.userInfoEndpoint(info -> info.userService(users)));',
    '        return http.build();',
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

  javaFile(files, options, pkg, 'EmailMessage', ['java.util.Map'], [
    'public record EmailMessage(String to, String subject, String template, Map<String, Object> variables) {}',
  ])

  javaFile(files, options, pkg, 'MailService', [
    'jakarta.mail.MessagingException',
    'jakarta.mail.internet.MimeMessage',
    'java.util.Map',
    'org.slf4j.Logger',
    'org.slf4j.LoggerFactory',
    'org.springframework.mail.javamail.JavaMailSender',
    'org.springframework.mail.javamail.MimeMessageHelper',
    'org.springframework.scheduling.annotation.Async',
    'org.springframework.stereotype.Service',
    'org.thymeleaf.TemplateEngine',
    'org.thymeleaf.context.Context',
  ], [
    '@Service',
    'public class MailService {',
    '',
    '    private static final Logger log = LoggerFactory.getLogger(MailService.class);',
    '',
    '    private final JavaMailSender sender;',
    '    private final TemplateEngine templates;',
    '',
    '    public MailService(JavaMailSender sender, TemplateEngine templates) {',
    '        this.sender = sender;',
    '        this.templates = templates;',
    '    }',
    '',
    '    @Async',
    '    public void send(EmailMessage message) {',
    '        Context context = new Context();',
    '        context.setVariables(message.variables());',
    '        String html = templates.process("email/" + message.template(), context);',
    '        try {',
    '            MimeMessage mime = sender.createMimeMessage();',
    '            MimeMessageHelper helper = new MimeMessageHelper(mime, "UTF-8");',
    '            helper.setTo(message.to());',
    '            helper.setSubject(message.subject());',
    '            helper.setText(html, true);',
    '            sender.send(mime);',
    '        } catch (MessagingException e) {',
    '            log.error("Failed to send {} to {}", message.template(), message.to(), e);',
    '        }',
    '    }',
    '',
    '    public void sendWelcome(String to, String name) {',
    `        send(new EmailMessage(to, "Welcome to ${options.projectName}", "welcome", Map.of("name", name, "appName", "${options.projectName}")));`,
    '    }',
    '',
    '    public void sendPasswordReset(String to, String resetUrl, int minutes) {',
    '        send(new EmailMessage(to, "Password reset", "password-reset", Map.of("resetUrl", resetUrl, "minutes", minutes)));',
    '    }',
    '',
    '    public void sendNotification(String to, String title, String message) {',
    '        send(new EmailMessage(to, title, "notification", Map.of("title", title, "message", message)));',
    '    }',
    '}',
  ])

  for (const [path, content] of mailTemplates(RESOURCES)) files.set(path, content)
  return files
}

// ============================================================================
// File storage
// ============================================================================

const STORAGE_IMPL: Record<StorageBackend, { className: string; imports: string[]; fields: string[]; put: string; get: string; remove: string }> = {
  local: {
    className: 'LocalFileStorageService',
    imports: ['java.io.IOException', 'java.io.UncheckedIOException', 'java.nio.file.Files', 'java.nio.file.Path', 'org.springframework.beans.factory.annotation.Value'],
    fields: [
      '    private final Path root;',
      '',
      '    public LocalFileStorageService(@Value("${storage.local.root:uploads}") String root) {',
      '        this.root = Path.of(root);',
      '    }',
    ],
    put: 'Files.createDirectories(root); Files.write(root.resolve(key), data);',
    get: 'return Files.readAllBytes(root.resolve(key));',
    remove: 'Files.deleteIfExists(root.resolve(key));',
  },
  s3: {
    className: 'S3FileStorageService',
    imports: [
      'org.springframework.beans.factory.annotation.Value',
      'software.amazon.awssdk.core.sync.RequestBody',
      'software.amazon.awssdk.services.s3.S3Client',
    ],
    fields: [
      '    private final S3Client client = S3Client.create();',
      '    private final String bucket;',
      '',
      '    public S3FileStorageService(@Value("${storage.s3.bucket}") String bucket) {',
      '        this.bucket = bucket;',
      '    }',
    ],
    put: 'client.putObject(b -> b.bucket(bucket).key(key), RequestBody.fromBytes(data));',
    get: 'return client.getObjectAsBytes(b -> b.bucket(bucket).key(key)).asByteArray();',
    remove: 'client.deleteObject(b -> b.bucket(bucket).key(key));',
  },
  azure: {
    className: 'AzureBlobStorageService',
    imports: [
      'com.azure.core.util.BinaryData',
      'com.azure.storage.blob.BlobContainerClient',
      'com.azure.storage.blob.BlobContainerClientBuilder',
      'org.springframework.beans.factory.annotation.Value',
    ],
    fields: [
      '    private final BlobContainerClient container;',
      '',
      '    public AzureBlobStorageService(',
      '            @Value("${storage.azure.connection-string}") String connectionString,',
      '            @Value("${storage.azure.container:uploads}") String container) {',
      '        this.container = new BlobContainerClientBuilder().connectionString(connectionString).containerName(container).buildClient();',
      '    }',
    ],
    put: 'container.getBlobClient(key).upload(BinaryData.fromBytes(data), true);',
    get: 'return container.getBlobClient(key).downloadContent().toBytes();',
    remove: 'container.getBlobClient(key).deleteIfExists();',
  },
}

function fileStorage(options: FeatureOptions): Map<string, string> {
  const files = new Map<string, string>()
  const pkg = 'storage'
  const impl = STORAGE_IMPL[options.storageBackend]
  const local = options.storageBackend === 'local'

  javaFile(files, options, pkg, 'FileStorageService', [], [
    'public interface FileStorageService {',
    '',
    '    String put(String key, byte[] data);',
    '',
    '    byte[] get(String key);',
    '',
    '    void delete(String key);',
    '}',
  ])

  const guard = (statement: string): string[] =>
    local
      ? ['        try {', `            ${statement}`, '        } catch (IOException e) {', '            throw new UncheckedIOException(e);', '        }']
      : [`        ${statement}`]

  javaFile(files, options, pkg, impl.className, ['org.springframework.stereotype.Service', ...impl.imports], [
    '@Service',
    `public class ${impl.className} implements FileStorageService {`,
    '',
    ...impl.fields,
    '',
    '    @Override',
    '    public String put(String key, byte[] data) {',
    ...guard(impl.put),
    '        return key;',
    '    }',
    '',
    '    @Override',
    '    public byte[] get(String key) {',
    ...guard(impl.get),
    '    }',
    '',
    '    @Override',
    '    public void delete(String key) {',
    ...guard(impl.remove),
    '    }',
    '}',
  ])

  javaFile(files, options, pkg, 'FileController', [
    'java.io.IOException',
    'java.util.UUID',
    'org.springframework.http.HttpStatus',
    'org.springframework.http.ResponseEntity',
    'org.springframework.web.bind.annotation.*',
    'org.springframework.web.multipart.MultipartFile',
  ], [
    '@RestController',
    '@RequestMapping("/api/files")',
    'public class FileController {',
    '',
    '    private final FileStorageService storage;',
    '',
    '    public FileController(FileStorageService storage) {',
    '        this.storage = storage;',
    '    }',
    '',
    '    @PostMapping',
    '    public ResponseEntity<String> upload(@RequestParam("file") MultipartFile file) throws IOException {',
    '        String key = UUID.randomUUID() + "-" + file.getOriginalFilename();',
    '        return ResponseEntity.status(HttpStatus.CREATED).body(storage.put(key, file.getBytes()));',
    '    }',
    '',
    '    @GetMapping("/{key}")',
    '    public byte[] download(@PathVariable String key) {',
    '        return storage.get(key);',
    '    }',
    '',
    '    @DeleteMapping("/{key}")',
    '    @ResponseStatus(HttpStatus.NO_CONTENT)',
    '    public void delete(@PathVariable String key) {',
    '        storage.delete(key);',
    '    }',
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

  javaFile(files, options, pkg, 'PasswordResetToken', [
    'jakarta.persistence.Column',
    'jakarta.persistence.Entity',
    'jakarta.persistence.Table',
    'java.time.Instant',
    `${options.namespace}.common.domain.BaseEntity`,
  ], [
    '@Entity',
    '@Table(name = "password_reset_tokens")',
    'public class PasswordResetToken extends BaseEntity {',
    '',
    '    @Column(nullable = false, unique = true)',
    '    private String token;',
    '',
    '    @Column(nullable = false)',
    '    private String email;',
    '',
    '    @Column(name = "expires_at", nullable = false)',
    '    private Instant expiresAt;',
    '',
    '    private boolean used;',
    '',
    '    protected PasswordResetToken() {}',
    '',
    '    public PasswordResetToken(String token, String email, Instant expiresAt) {',
    '        this.token = token;',
    '        this.email = email;',
    '        this.expiresAt = expiresAt;',
    '    }',
    '',
    '    public boolean isUsable(Instant now) {',
    '        return !used && expiresAt.isAfter(now);',
    '    }',
    '',
    '    public String consume() {',
    '        this.used = true;',
    '        return email;',
    '    }',
    '}',
  ])

  javaFile(files, options, pkg, 'PasswordResetTokenRepository', [
    'java.util.Optional',
    'org.springframework.data.jpa.repository.JpaRepository',
  ], [
    'public interface PasswordResetTokenRepository extends JpaRepository<PasswordResetToken, Long> {',
    '',
    '    Optional<PasswordResetToken> findByToken(String token);',
    '}',
  ])

  javaFile(files, options, pkg, 'PasswordResetService', [
    'java.security.SecureRandom',
    'java.time.Duration',
    'java.time.Instant',
    'java.util.HexFormat',
    'org.springframework.stereotype.Service',
    'org.springframework.transaction.annotation.Transactional',
  ], [
    '@Service',
    'public class PasswordResetService {',
    '',
    `    static final Duration TOKEN_LIFETIME = Duration.ofMinutes(${options.resetTokenMinutes});`,
    '',
    '    private final SecureRandom random = new SecureRandom();',
    '    private final PasswordResetTokenRepository tokens;',
    '',
    '    public PasswordResetService(PasswordResetTokenRepository tokens) {',
    '        this.tokens = tokens;',
    '    }',
    '',
    '    @Transactional',
    '    public String request(String email) {',
    '        byte[] bytes = new byte[32];',
    '        random.nextBytes(bytes);',
    '        String token = HexFormat.of().formatHex(bytes);',
    '        tokens.save(new PasswordResetToken(token, email, Instant.now().plus(TOKEN_LIFETIME)));',
    '        return token;',
    '    }',
    '',
    '    @Transactional',
    '    public String consume(String token) {',
    '        PasswordResetToken entry = tokens.findByToken(token)',
    '                .filter(t -> t.isUsable(Instant.now()))',
    '                .orElseThrow(() -> new IllegalArgumentException("Invalid or expired token"));',
    '        return entry.consume();',
    '    }',
    '}',
  ])

  javaFile(files, options, pkg, 'PasswordResetController', [
    'org.springframework.http.HttpStatus',
    'org.springframework.web.bind.annotation.*',
  ], [
    '@RestController',
    '@RequestMapping("/api/auth/password")',
    'public class PasswordResetController {',
    '',
    '    public record ForgotPasswordRequest(String email) {}',
    '',
    '    public record ResetPasswordRequest(String token, String password) {}',
    '',
    '    private final PasswordResetService resets;',
    '',
    '    public PasswordResetController(PasswordResetService resets) {',
    '        this.resets = resets;',
    '    }',
    '',
    '    @PostMapping("/forgot")',
    '    @ResponseStatus(HttpStatus.ACCEPTED)',
    '    public void forgot(@RequestBody ForgotPasswordRequest request) {',
    '        resets.request(request.email());',
    '    }',
    '',
    '    @PostMapping("/reset")',
    '    @ResponseStatus(HttpStatus.NO_CONTENT)',
    '    public void reset(@RequestBody ResetPasswordRequest request) {',
    '        resets.consume(request.token());',
    '    }',
    '}',
  ])
  return files
}

export const springFeatures: FeaturePackSet = {
  'social-login': definePack('social-login', socialLogin),
  mail: definePack('mail', mail),
  'file-storage': definePack('file-storage', fileStorage),
  'password-reset': definePack('password-reset', passwordReset),
}
